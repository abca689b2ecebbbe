import { err, ok, type Result } from 'neverthrow';
import {
  MAX_DISAMBIGUATION_SUFFIX,
  MAX_SPLIT_INDEX,
  MAX_SPLIT_NAME_LENGTH,
  MIN_SPLIT_INDEX,
} from '../constants.js';
import { EngineErr, type DirectoryCollisionError, type NamingInvalidError } from '../errors.js';
import {
  asSplitDirName,
  asSplitIndex,
  asSplitName,
  type SplitDirName,
  type SplitIndex,
  type SplitName,
} from '../ids/index.js';

/** Name suffix grammar: lowercase alphanumeric segments joined by single hyphens. */
export const SPLIT_NAME_PATTERN = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;

/** Directory grammar: two-digit index, hyphen, split name. */
export const SPLIT_DIR_PATTERN = /^(\d{2})-([a-z0-9]+(?:-[a-z0-9]+)*)$/;

/** A name whose leading segment is a bare two-digit index would read as a second prefix. */
const INDEX_PREFIX_PATTERN = /^\d{2}-/;

export interface IndexedEntry {
  readonly index: SplitIndex;
}

/**
 * Validate a split name (the part after `NN-`). Length is not limited here;
 * only `sanitizeSplitName` truncates.
 */
export function validateSplitName(name: string): Result<SplitName, NamingInvalidError> {
  if (name.length === 0) {
    return err(EngineErr.namingInvalid(name, 'Split name is empty'));
  }
  if (!SPLIT_NAME_PATTERN.test(name)) {
    return err(
      EngineErr.namingInvalid(
        name,
        `Invalid split name '${name}': use lowercase letters, digits and single hyphens (e.g. auth-system)`
      )
    );
  }
  if (INDEX_PREFIX_PATTERN.test(name)) {
    return err(
      EngineErr.namingInvalid(name, `Invalid split name '${name}': the index prefix is added separately, drop '${name.slice(0, 3)}'`)
    );
  }
  return ok(asSplitName(name));
}

/**
 * Best-effort conversion of a free-form title into a split name.
 * The result may still be invalid (e.g. empty); run it through `validateSplitName`.
 */
export function sanitizeSplitName(raw: string): string {
  let result = raw
    .toLowerCase()
    .replace(/[\s_]+/g, '-')
    .replace(/[^a-z0-9-]/g, '')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');

  if (result.length > MAX_SPLIT_NAME_LENGTH) {
    result = result.slice(0, MAX_SPLIT_NAME_LENGTH).replace(/-+$/, '');
  }
  return result;
}

export function formatSplitIndex(index: number): Result<SplitIndex, NamingInvalidError> {
  if (!Number.isInteger(index) || index < MIN_SPLIT_INDEX || index > MAX_SPLIT_INDEX) {
    return err(
      EngineErr.namingInvalid(String(index), `Split index must be ${MIN_SPLIT_INDEX}-${MAX_SPLIT_INDEX}, got ${index}`)
    );
  }
  return ok(asSplitIndex(String(index).padStart(2, '0')));
}

/**
 * Next index for an appended split: max existing + 1, never count + 1,
 * so that gaps left by removed splits are not reused.
 */
export function nextIndex(entries: readonly IndexedEntry[]): Result<SplitIndex, NamingInvalidError> {
  const max = entries.reduce((acc, e) => Math.max(acc, Number.parseInt(e.index, 10)), 0);
  return formatSplitIndex(max + 1);
}

export function formatSplitDirName(index: SplitIndex, name: SplitName): SplitDirName {
  return asSplitDirName(`${index}-${name}`);
}

export interface ParsedSplitDirName {
  readonly index: SplitIndex;
  readonly name: SplitName;
}

/**
 * Recognize `NN-name` directory names. Index `00` is not a split.
 */
export function parseSplitDirName(dirName: string): ParsedSplitDirName | null {
  const match = SPLIT_DIR_PATTERN.exec(dirName);
  if (!match) return null;
  const [, index, name] = match;
  if (index === undefined || name === undefined || index === '00') return null;
  return { index: asSplitIndex(index), name: asSplitName(name) };
}

export interface Disambiguated {
  readonly name: string;
  /** True when `name` differs from the requested base; callers must report it. */
  readonly renamed: boolean;
}

/**
 * Append `-2`, `-3`, ... to `base` until it no longer collides with `existing`.
 */
export function disambiguate(
  base: string,
  existing: ReadonlySet<string>
): Result<Disambiguated, DirectoryCollisionError> {
  if (!existing.has(base)) return ok({ name: base, renamed: false });

  for (let suffix = 2; suffix <= MAX_DISAMBIGUATION_SUFFIX; suffix++) {
    const candidate = `${base}-${suffix}`;
    if (!existing.has(candidate)) return ok({ name: candidate, renamed: true });
  }

  return err(
    EngineErr.directoryCollision(base, `Cannot find a free name for '${base}' (tried -2 through -${MAX_DISAMBIGUATION_SUFFIX})`)
  );
}

/**
 * Names a manifest entry may have on disk, in preference order:
 * the exact `NN-name`, then its disambiguated variants.
 */
export function candidateDirNames(dirName: SplitDirName): readonly SplitDirName[] {
  const out: SplitDirName[] = [dirName];
  for (let suffix = 2; suffix <= MAX_DISAMBIGUATION_SUFFIX; suffix++) {
    out.push(asSplitDirName(`${dirName}-${suffix}`));
  }
  return out;
}

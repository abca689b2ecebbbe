import { err, ok, type Result } from 'neverthrow';
import { MANIFEST_END_MARKER, MANIFEST_START_MARKER } from '../constants.js';
import { EngineErr, type ManifestMalformedError, type NamingInvalidError } from '../errors.js';
import type { SplitDirName, SplitIndex, SplitName } from '../ids/index.js';
import {
  formatSplitDirName,
  nextIndex,
  parseSplitDirName,
  sanitizeSplitName,
  validateSplitName,
} from './naming.js';

/**
 * SPLIT_MANIFEST block codec.
 *
 * The block must open the document:
 *
 *   <!-- SPLIT_MANIFEST
 *   01-backend
 *   02-frontend
 *   END_MANIFEST -->
 *
 * Anything after the end marker is prose and is never parsed.
 */

export interface ManifestEntry {
  readonly index: SplitIndex;
  readonly name: SplitName;
}

export interface SplitManifest {
  readonly entries: readonly ManifestEntry[];
}

const START_LINE = /^<!--\s*SPLIT_MANIFEST\s*$/;
const END_LINE = /^END_MANIFEST\s*-->$/;

const EXPECTED_FORMAT = `${MANIFEST_START_MARKER}\n01-name\n02-name\n${MANIFEST_END_MARKER}`;

export function entryDirName(entry: ManifestEntry): SplitDirName {
  return formatSplitDirName(entry.index, entry.name);
}

/** Entries sorted by numeric index (the order directories are materialized in). */
export function entriesInIndexOrder(manifest: SplitManifest): readonly ManifestEntry[] {
  return [...manifest.entries].sort((a, b) => Number.parseInt(a.index, 10) - Number.parseInt(b.index, 10));
}

export function decodeManifest(documentText: string): Result<SplitManifest, ManifestMalformedError> {
  const lines = documentText.split(/\r?\n/);

  const startAt = lines.findIndex((l) => l.trim().length > 0);
  if (startAt === -1) {
    return err(EngineErr.manifestMalformed('missing_block', `No SPLIT_MANIFEST block found. Expected format:\n${EXPECTED_FORMAT}`));
  }

  if (!START_LINE.test(lines[startAt]?.trim() ?? '')) {
    const buriedAt = lines.findIndex((l) => START_LINE.test(l.trim()));
    if (buriedAt !== -1) {
      return err(
        EngineErr.manifestMalformed(
          'marker_not_first',
          `SPLIT_MANIFEST block must be the first content of the document (found at line ${buriedAt + 1})`,
          { line: buriedAt + 1, text: lines[buriedAt] ?? '' }
        )
      );
    }
    return err(EngineErr.manifestMalformed('missing_block', `No SPLIT_MANIFEST block found. Expected format:\n${EXPECTED_FORMAT}`));
  }

  let endAt = -1;
  for (let i = startAt + 1; i < lines.length; i++) {
    if (END_LINE.test(lines[i]?.trim() ?? '')) {
      endAt = i;
      break;
    }
  }
  if (endAt === -1) {
    return err(
      EngineErr.manifestMalformed('unterminated_block', `SPLIT_MANIFEST block opened at line ${startAt + 1} has no '${MANIFEST_END_MARKER}'`)
    );
  }

  const parsed: Array<{ readonly entry: ManifestEntry; readonly line: number; readonly text: string }> = [];
  for (let i = startAt + 1; i < endAt; i++) {
    const text = (lines[i] ?? '').trim();
    if (text.length === 0) continue;

    const lineNo = i + 1;
    const entry = parseEntryLine(text);
    if (entry.isErr()) {
      return err(
        EngineErr.manifestMalformed(
          'invalid_line',
          `Line ${lineNo}: invalid split '${text}': must match NN-kebab-case (e.g. 01-backend, 02-api-gateway). ${entry.error.message}`,
          { line: lineNo, text }
        )
      );
    }
    parsed.push({ entry: entry.value, line: lineNo, text });
  }

  if (parsed.length === 0) {
    return err(EngineErr.manifestMalformed('empty_block', 'SPLIT_MANIFEST block is empty'));
  }

  const byIndex = new Map<string, number>();
  for (const p of parsed) {
    const firstLine = byIndex.get(p.entry.index);
    if (firstLine !== undefined) {
      return err(
        EngineErr.manifestMalformed(
          'duplicate_index',
          `Line ${p.line}: duplicate index ${p.entry.index} in '${p.text}' (already used on line ${firstLine})`,
          { line: p.line, text: p.text }
        )
      );
    }
    byIndex.set(p.entry.index, p.line);
  }

  const byName = new Map<string, number>();
  for (const p of parsed) {
    const firstLine = byName.get(p.entry.name);
    if (firstLine !== undefined) {
      return err(
        EngineErr.manifestMalformed(
          'duplicate_name',
          `Line ${p.line}: duplicate split name '${p.entry.name}' (already used on line ${firstLine})`,
          { line: p.line, text: p.text }
        )
      );
    }
    byName.set(p.entry.name, p.line);
  }

  return ok({ entries: parsed.map((p) => p.entry) });
}

export function encodeManifest(manifest: SplitManifest): string {
  const body = manifest.entries.map(entryDirName);
  return [MANIFEST_START_MARKER, ...body, MANIFEST_END_MARKER].join('\n');
}

/**
 * Append a split built from a free-form title at `max index + 1`.
 */
export function appendSplit(
  manifest: SplitManifest,
  title: string
): Result<{ readonly manifest: SplitManifest; readonly entry: ManifestEntry }, NamingInvalidError> {
  const candidate = sanitizeSplitName(title);
  return validateSplitName(candidate).andThen((name) => {
    if (manifest.entries.some((e) => e.name === name)) {
      return err(EngineErr.namingInvalid(name, `Split name '${name}' is already in the manifest`));
    }
    return nextIndex(manifest.entries).map((index) => {
      const entry: ManifestEntry = { index, name };
      return { manifest: { entries: [...manifest.entries, entry] }, entry };
    });
  });
}

function parseEntryLine(text: string): Result<ManifestEntry, NamingInvalidError> {
  const parsed = parseSplitDirName(text);
  if (!parsed) {
    return err(EngineErr.namingInvalid(text, 'Expected a two-digit index from 01 followed by a kebab-case name.'));
  }
  return validateSplitName(parsed.name).map((name) => ({ index: parsed.index, name }));
}

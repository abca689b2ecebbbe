import * as path from 'path';
import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { FileSystemPort, FsEntryKind, FsError } from '../ports/fs.port.js';
import { MANIFEST_FILENAME, SPLITS_DIRNAME } from '../durable-core/constants.js';
import {
  EngineErr,
  type DirectoryCollisionError,
  type ManifestMalformedError,
  type SplitRenamedWarning,
  type StorageUnwritableError,
} from '../durable-core/errors.js';
import { asSplitDirName, type SplitDirName } from '../durable-core/ids/index.js';
import { entriesInIndexOrder, entryDirName, type SplitManifest } from '../durable-core/domain/manifest-codec.js';
import { parseManifestFile } from '../durable-core/domain/manifest-file.js';
import { disambiguate } from '../durable-core/domain/naming.js';

export interface MaterializeOutcome {
  readonly created: readonly SplitDirName[];
  readonly skipped: readonly SplitDirName[];
  readonly renamed: readonly SplitRenamedWarning[];
}

export type MaterializeError = StorageUnwritableError | DirectoryCollisionError;

export interface MaterializeDeps {
  readonly fs: FileSystemPort;
  readonly logger: Logger;
}

const EMPTY_OUTCOME: MaterializeOutcome = { created: [], skipped: [], renamed: [] };

/**
 * Create one directory per manifest entry under `splitsRoot`, in index order.
 *
 * An entry already materialized (at its exact name or a disambiguated one) is
 * skipped; running this twice creates nothing the second time. When `NN-name`
 * is taken by a file, the split goes to the first free `NN-name-K` and the
 * rename is reported.
 */
export function materializeSplits(
  manifest: SplitManifest,
  splitsRoot: string,
  deps: MaterializeDeps
): ResultAsync<MaterializeOutcome, MaterializeError> {
  return preflight(splitsRoot, deps.fs)
    .andThen(() =>
      deps.fs
        .readdirEntries(splitsRoot)
        .mapErr((e) => EngineErr.storageUnwritable(splitsRoot, `Cannot list splits directory: ${e.message}`))
    )
    .andThen((entries) => {
      const onDisk = new Map<string, FsEntryKind>(entries.map((e) => [e.name, e.kind]));

      return entriesInIndexOrder(manifest).reduce<ResultAsync<MaterializeOutcome, MaterializeError>>(
        (acc, entry) => acc.andThen((outcome) => placeEntry(entryDirName(entry), splitsRoot, onDisk, outcome, deps)),
        okAsync(EMPTY_OUTCOME)
      );
    })
    .map((outcome) => {
      deps.logger.info(
        { splitsRoot, created: outcome.created.length, skipped: outcome.skipped.length, renamed: outcome.renamed.length },
        'Split directories materialized'
      );
      return outcome;
    });
}

/**
 * Read `project-manifest.md` from the planning directory and materialize its
 * entries under `splits/`.
 */
export function materializeFromPlanningDir(
  planningDir: string,
  deps: MaterializeDeps
): ResultAsync<MaterializeOutcome, MaterializeError | ManifestMalformedError> {
  const root = path.resolve(planningDir);

  return deps.fs
    .stat(root)
    .mapErr((e) =>
      e.code === 'FS_NOT_FOUND'
        ? EngineErr.storageUnwritable(root, `Planning directory not found: ${root}`)
        : EngineErr.storageUnwritable(root, `Cannot access planning directory: ${e.message}`)
    )
    .andThen((s) =>
      s.kind === 'directory'
        ? okAsync(undefined)
        : errAsync(EngineErr.storageUnwritable(root, `Planning path is not a directory: ${root}`))
    )
    .andThen(() => parseManifestFile(path.join(root, MANIFEST_FILENAME), deps.fs))
    .andThen((manifest) => materializeSplits(manifest, path.join(root, SPLITS_DIRNAME), deps));
}

function preflight(splitsRoot: string, fs: FileSystemPort): ResultAsync<void, StorageUnwritableError> {
  const toError = (e: FsError) => EngineErr.storageUnwritable(splitsRoot, `Cannot create splits directory: ${e.message}`);

  return fs
    .mkdirp(splitsRoot)
    .mapErr(toError)
    .andThen(() => fs.stat(splitsRoot).mapErr(toError))
    .andThen((s) =>
      s.kind === 'directory'
        ? okAsync(undefined)
        : errAsync(EngineErr.storageUnwritable(splitsRoot, `Splits path is not a directory: ${splitsRoot}`))
    );
}

function placeEntry(
  dirName: SplitDirName,
  splitsRoot: string,
  onDisk: Map<string, FsEntryKind>,
  outcome: MaterializeOutcome,
  deps: MaterializeDeps
): ResultAsync<MaterializeOutcome, MaterializeError> {
  const occupied = new Set([...onDisk].filter(([, kind]) => kind !== 'directory').map(([name]) => name));

  const target = disambiguate(dirName, occupied);
  if (target.isErr()) return errAsync(target.error);

  const name = asSplitDirName(target.value.name);
  if (onDisk.get(name) === 'directory') {
    return okAsync({ ...outcome, skipped: [...outcome.skipped, name] });
  }

  return deps.fs
    .mkdir(path.join(splitsRoot, name))
    .map((): MaterializeOutcome => {
      onDisk.set(name, 'directory');
      if (!target.value.renamed) return { ...outcome, created: [...outcome.created, name] };

      const warning: SplitRenamedWarning = {
        kind: 'DirectoryCollision',
        from: dirName,
        to: name,
        message: `'${dirName}' is occupied by a non-directory; created '${name}' instead`,
      };
      deps.logger.warn({ from: dirName, to: name }, 'Split directory renamed');
      return { ...outcome, created: [...outcome.created, name], renamed: [...outcome.renamed, warning] };
    })
    .orElse((e): ResultAsync<MaterializeOutcome, MaterializeError> => {
      const dirPath = path.join(splitsRoot, name);
      if (e.code !== 'FS_ALREADY_EXISTS') {
        return errAsync(EngineErr.storageUnwritable(dirPath, `Cannot create split directory: ${e.message}`));
      }
      // Another invocation got there first.
      return deps.fs
        .stat(dirPath)
        .mapErr((se) => EngineErr.storageUnwritable(dirPath, `Cannot access split directory: ${se.message}`))
        .andThen((s) =>
          s.kind === 'directory'
            ? okAsync({ ...outcome, skipped: [...outcome.skipped, name] })
            : errAsync(EngineErr.directoryCollision(name, `'${name}' was taken by a non-directory while materializing`))
        );
    });
}

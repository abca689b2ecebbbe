import * as path from 'path';
import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import type { FileReadPort } from '../ports/fs.port.js';
import { MANIFEST_FILENAME } from '../durable-core/constants.js';
import type { ManifestMalformedError, NamingInvalidError, StorageUnwritableError } from '../durable-core/errors.js';
import type { SplitDirName, SplitIndex, SplitName } from '../durable-core/ids/index.js';
import { appendSplit, encodeManifest, entryDirName, type SplitManifest } from '../durable-core/domain/manifest-codec.js';
import { parseManifestFile } from '../durable-core/domain/manifest-file.js';

export interface ProposedSplit {
  readonly index: SplitIndex;
  readonly name: SplitName;
  readonly dirName: SplitDirName;
  /** True when the title had to be sanitized into a valid name. */
  readonly sanitized: boolean;
  /** The manifest block with the proposal appended. */
  readonly manifestBlock: string;
}

export type ProposeSplitError = ManifestMalformedError | NamingInvalidError | StorageUnwritableError;

/**
 * Next `NN-name` for a split title, given the manifest in the planning
 * directory (an absent manifest counts as empty). Writes nothing.
 */
export function proposeSplit(
  planningDir: string,
  title: string,
  fs: FileReadPort
): ResultAsync<ProposedSplit, ProposeSplitError> {
  const manifestPath = path.join(path.resolve(planningDir), MANIFEST_FILENAME);

  return parseManifestFile(manifestPath, fs)
    .orElse((e) =>
      e.kind === 'ManifestMalformed' && e.reason === 'missing_file' ? okAsync<SplitManifest>({ entries: [] }) : errAsync(e)
    )
    .andThen((manifest) => {
      const appended = appendSplit(manifest, title);
      if (appended.isErr()) return errAsync(appended.error);

      const { entry } = appended.value;
      return okAsync({
        index: entry.index,
        name: entry.name,
        dirName: entryDirName(entry),
        sanitized: entry.name !== title,
        manifestBlock: encodeManifest(appended.value.manifest),
      });
    });
}

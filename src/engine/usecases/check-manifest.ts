import * as path from 'path';
import type { ResultAsync } from 'neverthrow';
import type { FileReadPort } from '../ports/fs.port.js';
import { MANIFEST_FILENAME } from '../durable-core/constants.js';
import type { ManifestMalformedError, StorageUnwritableError } from '../durable-core/errors.js';
import type { SplitDirName } from '../durable-core/ids/index.js';
import { entryDirName } from '../durable-core/domain/manifest-codec.js';
import { parseManifestFile } from '../durable-core/domain/manifest-file.js';

export interface ManifestCheck {
  readonly manifestPath: string;
  /** Entries as declared, in document order. */
  readonly splits: readonly SplitDirName[];
}

export function checkManifest(
  planningDir: string,
  fs: FileReadPort
): ResultAsync<ManifestCheck, ManifestMalformedError | StorageUnwritableError> {
  const manifestPath = path.join(path.resolve(planningDir), MANIFEST_FILENAME);
  return parseManifestFile(manifestPath, fs).map((manifest) => ({
    manifestPath,
    splits: manifest.entries.map(entryDirName),
  }));
}

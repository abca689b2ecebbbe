import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import type { FileReadPort } from '../../ports/fs.port.js';
import { EngineErr, type ManifestMalformedError, type StorageUnwritableError } from '../errors.js';
import { decodeManifest, type SplitManifest } from './manifest-codec.js';

export function parseManifestFile(
  manifestPath: string,
  fs: FileReadPort
): ResultAsync<SplitManifest, ManifestMalformedError | StorageUnwritableError> {
  return fs
    .readFileUtf8(manifestPath)
    .mapErr((e): ManifestMalformedError | StorageUnwritableError =>
      e.code === 'FS_NOT_FOUND' || e.code === 'FS_NOT_A_DIRECTORY'
        ? EngineErr.manifestMalformed('missing_file', `Manifest not found: ${manifestPath}`)
        : EngineErr.storageUnwritable(manifestPath, `Cannot read manifest: ${e.message}`)
    )
    .andThen((text) => {
      const decoded = decodeManifest(text);
      return decoded.isOk() ? okAsync(decoded.value) : errAsync(decoded.error);
    });
}

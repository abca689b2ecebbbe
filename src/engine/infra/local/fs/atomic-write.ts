import * as path from 'path';
import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import type { FileSystemPort, FsError } from '../../../ports/fs.port.js';

/**
 * Crash-safe replace of `filePath`:
 * mkdirp -> openWriteTruncate(tmp) -> writeAll -> fsyncFile -> closeFile -> rename -> fsyncDir.
 *
 * Readers see either the previous content or the new one, never a torn file.
 * The temp name includes `tmpTag` so concurrent writers of the same target do
 * not share a temp file. Directory fsync is skipped where the platform does not
 * support it (FS_UNSUPPORTED); every other failure propagates.
 */
export function writeFileAtomic(
  fs: FileSystemPort,
  filePath: string,
  bytes: Uint8Array,
  tmpTag: string
): ResultAsync<void, FsError> {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(dir, `.${path.basename(filePath)}.${tmpTag}.tmp`);

  return fs
    .mkdirp(dir)
    .andThen(() => fs.openWriteTruncate(tmpPath))
    .andThen(({ fd }) =>
      fs
        .writeAll(fd, bytes)
        .andThen(() => fs.fsyncFile(fd))
        .orElse((e) =>
          fs
            .closeFile(fd)
            .orElse(() => okAsync(undefined))
            .andThen(() => discardTemp(fs, tmpPath, e))
        )
        // A failed close has already released the fd; never close it twice.
        .andThen(() => fs.closeFile(fd).orElse((e) => discardTemp(fs, tmpPath, e)))
    )
    .andThen(() => fs.rename(tmpPath, filePath).orElse((e) => discardTemp(fs, tmpPath, e)))
    .andThen(() => fs.fsyncDir(dir).orElse((e) => (e.code === 'FS_UNSUPPORTED' ? okAsync(undefined) : errAsync(e))));
}

/** Remove the temp file, then surface `cause`. */
function discardTemp(fs: FileSystemPort, tmpPath: string, cause: FsError): ResultAsync<never, FsError> {
  return fs
    .unlink(tmpPath)
    .orElse(() => okAsync(undefined))
    .andThen(() => errAsync(cause));
}

export function utf8Bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

import type { ResultAsync } from 'neverthrow';
import type { FileReadPort, FsError } from '../../ports/fs.port.js';
import type { Sha256Port } from '../../ports/sha256.port.js';
import { EngineErr, type InputUnavailableError } from '../errors.js';
import type { Sha256Digest } from '../ids/index.js';

/**
 * Content fingerprint of an input document. Compared for equality only.
 */
export function fingerprint(bytes: Uint8Array, sha256: Sha256Port): Sha256Digest {
  return sha256.sha256(bytes);
}

export function fingerprintFile(
  filePath: string,
  deps: { readonly fs: FileReadPort; readonly sha256: Sha256Port }
): ResultAsync<Sha256Digest, InputUnavailableError> {
  return deps.fs
    .readFileBytes(filePath)
    .map((bytes) => fingerprint(bytes, deps.sha256))
    .mapErr((e) => toInputUnavailable(e, filePath));
}

export function toInputUnavailable(e: FsError, filePath: string): InputUnavailableError {
  switch (e.code) {
    case 'FS_NOT_FOUND':
    case 'FS_NOT_A_DIRECTORY':
      return EngineErr.inputUnavailable('not_found', filePath, `File not found: ${filePath}`);
    case 'FS_PERMISSION_DENIED':
      return EngineErr.inputUnavailable('permission_denied', filePath, `Cannot read file (permission denied): ${filePath}`);
    default:
      return EngineErr.inputUnavailable('unreadable', filePath, `Cannot read file: ${e.message}`);
  }
}

import * as path from 'path';
import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import type { FileReadPort } from '../ports/fs.port.js';
import type { Sha256Port } from '../ports/sha256.port.js';
import { INPUT_FILE_EXTENSION } from '../durable-core/constants.js';
import { EngineErr, type InputUnavailableError } from '../durable-core/errors.js';
import type { Sha256Digest } from '../durable-core/ids/index.js';
import { fingerprint, toInputUnavailable } from '../durable-core/domain/fingerprint.js';

export interface ValidatedInput {
  /** Absolute path of the requirements document. */
  readonly inputPath: string;
  /** Parent of `inputPath`; every artifact lives under it. */
  readonly planningDir: string;
  readonly fingerprint: Sha256Digest;
}

/**
 * The input must be an existing, non-empty `.md` regular file.
 * Its content is hashed, never interpreted.
 */
export function validateInput(
  rawPath: string,
  deps: { readonly fs: FileReadPort; readonly sha256: Sha256Port }
): ResultAsync<ValidatedInput, InputUnavailableError> {
  const inputPath = path.resolve(rawPath);

  if (path.extname(inputPath).toLowerCase() !== INPUT_FILE_EXTENSION) {
    return errAsync(
      EngineErr.inputUnavailable(
        'unsupported_extension',
        inputPath,
        `Input must be a markdown (${INPUT_FILE_EXTENSION}) file: ${inputPath}`
      )
    );
  }

  return deps.fs
    .stat(inputPath)
    .mapErr((e) => toInputUnavailable(e, inputPath))
    .andThen((s) =>
      s.kind === 'file'
        ? okAsync(s)
        : errAsync(EngineErr.inputUnavailable('not_a_file', inputPath, `Not a regular file: ${inputPath}`))
    )
    .andThen(() => deps.fs.readFileBytes(inputPath).mapErr((e) => toInputUnavailable(e, inputPath)))
    .andThen((bytes) => {
      if (new TextDecoder().decode(bytes).trim().length === 0) {
        return errAsync(EngineErr.inputUnavailable('empty', inputPath, `Input file is empty: ${inputPath}`));
      }
      return okAsync({
        inputPath,
        planningDir: path.dirname(inputPath),
        fingerprint: fingerprint(bytes, deps.sha256),
      });
    });
}

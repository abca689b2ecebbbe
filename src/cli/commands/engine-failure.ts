import type { EngineError } from '../../engine/durable-core/errors.js';
import { formatEngineError } from '../../errors/formatter.js';
import { assertNever } from '../../runtime/assert-never.js';
import { failure } from '../types/cli-result.js';
import type { CliResult } from '../types/cli-result.js';

function suggestionsFor(error: EngineError): readonly string[] | undefined {
  switch (error.kind) {
    case 'InputUnavailable':
      return ['Pass an existing, non-empty .md file'];
    case 'ManifestMalformed':
      return ['Start project-manifest.md with a <!-- SPLIT_MANIFEST ... END_MANIFEST --> block of NN-kebab-case lines'];
    case 'NamingInvalid':
      return ['Use lowercase letters, digits and single hyphens'];
    case 'DirectoryCollision':
    case 'StorageUnwritable':
      return undefined;
    case 'SessionCorrupt':
      return [`Delete ${error.path} to start the session over`];
    default:
      return assertNever(error);
  }
}

/**
 * Fatal engine error as a CLI failure. The JSON payload carries every field of the error.
 */
export function engineFailure(error: EngineError): CliResult {
  return failure(error, { details: [formatEngineError(error)], suggestions: suggestionsFor(error) });
}

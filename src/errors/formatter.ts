import type { AppError } from './app-error.js';
import type { EngineError, EngineWarning } from '../engine/durable-core/errors.js';
import { assertNever } from '../runtime/assert-never.js';

export function formatAppError(error: AppError): string {
  switch (error.kind) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    case 'Unexpected':
      return `${error.message}\nCause: ${safeToString(error.cause)}`;

    default:
      return assertNever(error);
  }
}

/**
 * One line per engine error, with the detail that locates it.
 */
export function formatEngineError(error: EngineError): string {
  switch (error.kind) {
    case 'InputUnavailable':
      return `Input unavailable (${error.reason}): ${error.message}`;
    case 'ManifestMalformed':
      return error.line !== undefined
        ? `Malformed manifest (${error.reason}, line ${error.line}): ${error.message}`
        : `Malformed manifest (${error.reason}): ${error.message}`;
    case 'NamingInvalid':
      return `Invalid split name '${error.name}': ${error.message}`;
    case 'DirectoryCollision':
      return `Directory collision for '${error.name}': ${error.message}`;
    case 'StorageUnwritable':
      return `Storage unwritable at ${error.path}: ${error.message}`;
    case 'SessionCorrupt':
      return `Corrupt session record at ${error.path}: ${error.message} (delete it to start over)`;
    default:
      return assertNever(error);
  }
}

export function formatEngineWarning(warning: EngineWarning): string {
  switch (warning.kind) {
    case 'InputDrifted':
      return `${warning.message} (re-run with --accept-input-change to adopt it)`;
    case 'SessionNamespaceUnavailable':
    case 'ManifestMalformed':
    case 'TaskPublishSkipped':
      return warning.message;
    case 'DirectoryCollision':
      return `Renamed ${warning.from} -> ${warning.to}: ${warning.message}`;
    default:
      return assertNever(warning);
  }
}

function safeToString(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  try {
    return typeof value === 'string' ? value : JSON.stringify(value);
  } catch {
    return String(value);
  }
}

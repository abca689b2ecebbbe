import type { TerminationCode } from '../../runtime/ports/process-terminator.js';
import { assertNever } from '../../runtime/assert-never.js';

/**
 * Typed exit codes for CLI commands, following Unix conventions.
 */
export type ExitCode =
  | { kind: 'success' } // 0
  | { kind: 'general_error' } // 1: a fatal engine or config error
  | { kind: 'misuse' }; // 2: bad arguments

export function toTerminationCode(exitCode: ExitCode): TerminationCode {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'general_error':
      return { kind: 'failure' };
    case 'misuse':
      return { kind: 'misuse' };
    default:
      return assertNever(exitCode);
  }
}

/**
 * Numeric value for raw process exit. Only for boundaries where DI is unavailable.
 */
export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
    default:
      return assertNever(exitCode);
  }
}

/**
 * CLI Result Types
 *
 * Discriminated unions for CLI command outcomes.
 * Commands return these types; the composition root interprets them.
 */

import type { ExitCode } from './exit-code.js';

/**
 * Machine-readable result, printed as one JSON line on stdout.
 */
export type JsonPayload = { readonly [key: string]: unknown };

/**
 * Human-readable rendering of the same result (`--pretty`).
 */
export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

/**
 * `payload: null` prints nothing in JSON mode (hooks that have nothing to say).
 */
export type CliResult =
  | { readonly kind: 'success'; readonly payload: JsonPayload | null; readonly output?: CliOutput }
  | { readonly kind: 'failure'; readonly exitCode: ExitCode; readonly payload: JsonPayload; readonly output: CliOutput };

export function success(payload: JsonPayload | null, output?: CliOutput): CliResult {
  return { kind: 'success', payload, output };
}

/**
 * General failure (exit 1). The payload follows `{ success: false, error }`.
 */
export function failure(
  error: { readonly kind: string; readonly message: string },
  options?: {
    details?: readonly string[];
    suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'general_error' },
    payload: { success: false, error },
    output: {
      message: error.message,
      details: options?.details,
      suggestions: options?.suggestions,
    },
  };
}

/**
 * Misuse failure (exit 2): bad arguments.
 */
export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'misuse' },
    payload: { success: false, error: { kind: 'Misuse', message } },
    output: { message, suggestions },
  };
}

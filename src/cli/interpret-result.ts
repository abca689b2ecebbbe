/**
 * CLI Result Interpreter
 *
 * The only place a CliResult turns into process termination.
 */

import type { CliResult } from './types/cli-result.js';
import { toTerminationCode } from './types/exit-code.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult, type CliWriter, type OutputFormat } from './output-formatter.js';

export function interpretCliResult(
  result: CliResult,
  format: OutputFormat,
  terminator: ProcessTerminator,
  writer?: CliWriter
): void {
  printResult(result, format, writer);

  switch (result.kind) {
    case 'success':
      // Let the process end naturally so pino can flush.
      return;

    case 'failure':
      terminator.terminate(toTerminationCode(result.exitCode));
  }
}

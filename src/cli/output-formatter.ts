/**
 * CLI Output Formatter
 *
 * JSON for the agent by default, chalk for humans with `--pretty`.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';
import { assertNever } from '../runtime/assert-never.js';

export type OutputFormat = { readonly kind: 'json' } | { readonly kind: 'pretty' };

export interface CliWriter {
  out(text: string): void;
  err(text: string): void;
}

export const consoleWriter: CliWriter = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

/**
 * Format a CliOutput structure to a styled string.
 */
export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [];

  lines.push(isError ? chalk.red(`❌ ${output.message}`) : chalk.green(`✅ ${output.message}`));

  if (output.details && output.details.length > 0) {
    lines.push('');
    output.details.forEach((detail) => {
      lines.push(chalk.white(`  • ${detail}`));
    });
  }

  if (output.warnings && output.warnings.length > 0) {
    lines.push('');
    lines.push(chalk.yellow('⚠️  Warnings:'));
    output.warnings.forEach((warning) => {
      lines.push(chalk.yellow(`  • ${warning}`));
    });
  }

  if (output.suggestions && output.suggestions.length > 0) {
    lines.push('');
    lines.push(chalk.gray('💡 Suggestions:'));
    output.suggestions.forEach((suggestion) => {
      lines.push(chalk.gray(`  • ${suggestion}`));
    });
  }

  return lines.join('\n');
}

/**
 * The text a result prints as, or null when it prints nothing.
 */
export function formatResult(result: CliResult, format: OutputFormat): string | null {
  switch (format.kind) {
    case 'json':
      return result.payload === null ? null : JSON.stringify(result.payload);

    case 'pretty':
      if (result.kind === 'failure') return formatOutput(result.output, true);
      return result.output ? formatOutput(result.output, false) : null;

    default:
      return assertNever(format);
  }
}

/**
 * JSON always goes to stdout, where the agent reads it. Pretty failures go to stderr.
 */
export function printResult(result: CliResult, format: OutputFormat, writer: CliWriter = consoleWriter): void {
  const formatted = formatResult(result, format);
  if (formatted === null) return;

  if (format.kind === 'pretty' && result.kind === 'failure') {
    writer.err(formatted);
  } else {
    writer.out(formatted);
  }
}

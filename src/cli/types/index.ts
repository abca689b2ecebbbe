export type { ExitCode } from './exit-code.js';
export { toTerminationCode, toNumericExitCode } from './exit-code.js';

export type { CliOutput, CliResult, JsonPayload } from './cli-result.js';
export { success, failure, misuse } from './cli-result.js';

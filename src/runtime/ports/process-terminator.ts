/**
 * Port for terminating the current process.
 * Only composition roots / entrypoints use it.
 */
export type TerminationCode = { kind: 'success' } | { kind: 'failure' } | { kind: 'misuse' };

export interface ProcessTerminator {
  terminate(code: TerminationCode): never;
}

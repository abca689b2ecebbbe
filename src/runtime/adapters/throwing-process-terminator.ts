import type { TerminationCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: never exits the process, so an accidental termination fails loudly.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: TerminationCode): never {
    throw new Error(`[ProcessTerminator] terminate(${code.kind})`);
  }
}

/**
 * capture-session-id: SessionStart hook. Always succeeds.
 */

import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import type { CaptureSessionIdInput, CaptureSessionIdOutcome } from '../../engine/usecases/capture-session-id.js';

export interface CaptureSessionIdCommandDeps {
  readonly readStdin: () => Promise<string>;
  readonly captureSessionId: (input: CaptureSessionIdInput) => Promise<CaptureSessionIdOutcome>;
  readonly currentSessionId?: string;
  readonly envFile?: string;
}

export async function executeCaptureSessionIdCommand(deps: CaptureSessionIdCommandDeps): Promise<CliResult> {
  const payloadText = await deps.readStdin();
  const { hookOutput, sessionId, appendedLines } = await deps.captureSessionId({
    payloadText,
    currentSessionId: deps.currentSessionId,
    envFile: deps.envFile,
  });

  return success(hookOutput, {
    message: sessionId ? `Session id captured: ${sessionId}` : 'No session id in hook payload',
    details: appendedLines.map((l) => `appended: ${l}`),
  });
}

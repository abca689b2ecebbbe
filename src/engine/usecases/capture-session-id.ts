import { errAsync, okAsync, ResultAsync } from 'neverthrow';
import { z } from 'zod';
import type { Logger } from '../../core/logging/index.js';

const HookPayloadSchema = z
  .object({
    session_id: z.string().trim().min(1),
    transcript_path: z.string().trim().min(1).optional(),
  })
  .passthrough();

export const SESSION_ID_ENV_VAR = 'SPLITWRIGHT_SESSION_ID';
export const TRANSCRIPT_PATH_ENV_VAR = 'SPLITWRIGHT_TRANSCRIPT_PATH';

export interface EnvFileIo {
  /** Null when the file does not exist yet. */
  read(filePath: string): ResultAsync<string | null, Error>;
  append(filePath: string, text: string): ResultAsync<void, Error>;
}

export interface CaptureSessionIdInput {
  readonly payloadText: string;
  readonly currentSessionId?: string;
  readonly envFile?: string;
}

export type HookOutput = {
  readonly hookSpecificOutput: {
    readonly hookEventName: 'SessionStart';
    readonly additionalContext: string;
  };
};

export interface CaptureSessionIdOutcome {
  /** What the hook prints, or null when the session id is already known. */
  readonly hookOutput: HookOutput | null;
  readonly sessionId: string | null;
  readonly appendedLines: readonly string[];
}

const NOTHING: CaptureSessionIdOutcome = { hookOutput: null, sessionId: null, appendedLines: [] };

/**
 * SessionStart hook: surface the agent's session id as additional context and
 * persist it to the env file the agent sources, so later commands can find it.
 *
 * Never fails. A bad payload or an env-file problem only produces less output.
 */
export function captureSessionId(
  input: CaptureSessionIdInput,
  deps: { readonly io: EnvFileIo; readonly logger: Logger }
): Promise<CaptureSessionIdOutcome> {
  let json: unknown;
  try {
    json = JSON.parse(input.payloadText);
  } catch {
    deps.logger.debug('Hook payload is not JSON; nothing to capture');
    return Promise.resolve(NOTHING);
  }

  const parsed = HookPayloadSchema.safeParse(json);
  if (!parsed.success) {
    deps.logger.debug('Hook payload has no session_id; nothing to capture');
    return Promise.resolve(NOTHING);
  }

  const sessionId = parsed.data.session_id;
  const transcriptPath = parsed.data.transcript_path;

  const hookOutput: HookOutput | null =
    input.currentSessionId === sessionId
      ? null
      : {
          hookSpecificOutput: {
            hookEventName: 'SessionStart',
            additionalContext: `${SESSION_ID_ENV_VAR}=${sessionId}`,
          },
        };

  const wanted = [`export ${SESSION_ID_ENV_VAR}=${shellQuote(sessionId)}`];
  if (transcriptPath) wanted.push(`export ${TRANSCRIPT_PATH_ENV_VAR}=${shellQuote(transcriptPath)}`);

  const appended: ResultAsync<readonly string[], never> = input.envFile
    ? appendMissingLines(input.envFile, wanted, deps.io).orElse((e) => {
        deps.logger.warn({ err: e, envFile: input.envFile }, 'Could not update env file');
        return okAsync<readonly string[]>([]);
      })
    : okAsync<readonly string[]>([]);

  return appended.map((appendedLines) => ({ hookOutput, sessionId, appendedLines })).unwrapOr(NOTHING);
}

/** Single-quoted for a POSIX shell that sources the env file. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function appendMissingLines(
  envFile: string,
  wanted: readonly string[],
  io: EnvFileIo
): ResultAsync<readonly string[], Error> {
  return io.read(envFile).andThen((existing) => {
    const have = new Set((existing ?? '').split(/\r?\n/).map((l) => l.trim()));
    const missing = wanted.filter((l) => !have.has(l));
    if (missing.length === 0) return okAsync<readonly string[]>([]);

    const lead = existing && !existing.endsWith('\n') ? '\n' : '';
    return io.append(envFile, `${lead}${missing.join('\n')}\n`).map((): readonly string[] => missing);
  });
}

/**
 * Env file IO over node's fs. Wraps rejections as errors-as-data.
 */
export function nodeEnvFileIo(fsp: {
  readFile(p: string, enc: 'utf8'): Promise<string>;
  appendFile(p: string, data: string, enc: 'utf8'): Promise<void>;
}): EnvFileIo {
  const toError = (e: unknown): Error => (e instanceof Error ? e : new Error(String(e)));
  return {
    read: (filePath) =>
      ResultAsync.fromPromise(fsp.readFile(filePath, 'utf8'), (e) => e).orElse((e) =>
        isNotFound(e) ? okAsync(null) : errAsync(toError(e))
      ),
    append: (filePath, text) => ResultAsync.fromPromise(fsp.appendFile(filePath, text, 'utf8'), toError),
  };
}

function isNotFound(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}

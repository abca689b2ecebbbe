import type { Sha256Port } from '../../ports/sha256.port.js';
import { INPUT_KEY_HEX_LENGTH, LOCAL_SESSION_PREFIX } from '../constants.js';
import { asSessionId, type SessionId } from '../ids/index.js';

/**
 * Stable short key for an absolute input path: the first hex characters of its sha256.
 * Separates records of different documents that share one session id.
 */
export function inputKeyFor(inputPath: string, sha256: Sha256Port): string {
  const digest = sha256.sha256(new TextEncoder().encode(inputPath));
  return digest.slice('sha256:'.length, 'sha256:'.length + INPUT_KEY_HEX_LENGTH);
}

/**
 * Session namespace used when the environment supplies no session id.
 * Deterministic per input path, so drift detection still works across invocations.
 */
export function localSessionIdFor(inputPath: string, sha256: Sha256Port): SessionId {
  return asSessionId(`${LOCAL_SESSION_PREFIX}${inputKeyFor(inputPath, sha256)}`);
}

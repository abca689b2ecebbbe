import type { ResultAsync } from 'neverthrow';
import type { StepMarkers } from '../durable-core/domain/resume-resolver.js';
import type {
  InputDriftedWarning,
  InputUnavailableError,
  SessionCorruptError,
  StorageUnwritableError,
} from '../durable-core/errors.js';
import type { SessionId } from '../durable-core/ids/index.js';
import type { SessionRecord } from '../durable-core/schemas/session/index.js';

export type SessionStoreError = SessionCorruptError | StorageUnwritableError | InputUnavailableError;

export interface LoadedSession {
  /** Stored record with `stepMarkers` replaced by the fresh probe. */
  readonly record: SessionRecord;
  readonly markers: StepMarkers;
  /** Set when the input bytes no longer match the stored fingerprint. */
  readonly drift: InputDriftedWarning | null;
}

/**
 * Port: session persistence keyed by (sessionId, inputPath).
 *
 * The stored record is advisory. `load` re-derives step markers from disk and
 * re-fingerprints the input on every call; `save` is an atomic replace so a
 * torn record is never observable.
 */
export interface SessionStorePort {
  /** Null when no record exists for the pair. */
  load(sessionId: SessionId, inputPath: string): ResultAsync<LoadedSession | null, SessionStoreError>;
  save(record: SessionRecord): ResultAsync<void, StorageUnwritableError>;
}

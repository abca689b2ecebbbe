import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import type { DataDirPort } from '../../../ports/data-dir.port.js';
import type { FileSystemPort } from '../../../ports/fs.port.js';
import type { Sha256Port } from '../../../ports/sha256.port.js';
import type { TimeClockPort } from '../../../ports/time-clock.port.js';
import type { ArtifactProbePort } from '../../../ports/artifact-probe.port.js';
import type { LoadedSession, SessionStoreError, SessionStorePort } from '../../../ports/session-store.port.js';
import type { SessionId } from '../../../durable-core/ids/index.js';
import { EngineErr, type InputDriftedWarning, type StorageUnwritableError } from '../../../durable-core/errors.js';
import { SessionRecordV1Schema, toStoredMarkers, type SessionRecord } from '../../../durable-core/schemas/session/index.js';
import { fingerprintFile } from '../../../durable-core/domain/fingerprint.js';
import { inputKeyFor } from '../../../durable-core/domain/session-keys.js';
import { utf8Bytes, writeFileAtomic } from '../fs/atomic-write.js';

export interface LocalSessionStoreDeps {
  readonly dataDir: DataDirPort;
  readonly fs: FileSystemPort;
  readonly sha256: Sha256Port;
  readonly probe: ArtifactProbePort;
  readonly clock: TimeClockPort;
}

/**
 * JSON session records under the engine data dir, one per (sessionId, inputPath).
 *
 * The record only caches: every load re-probes the planning directory and
 * re-fingerprints the input, so two processes sharing a session id converge on
 * what the disk says regardless of who wrote the record last.
 */
export class LocalSessionStore implements SessionStorePort {
  constructor(private readonly deps: LocalSessionStoreDeps) {}

  recordPath(sessionId: SessionId, inputPath: string): string {
    return this.deps.dataDir.sessionRecordPath(sessionId, inputKeyFor(inputPath, this.deps.sha256));
  }

  load(sessionId: SessionId, inputPath: string): ResultAsync<LoadedSession | null, SessionStoreError> {
    const filePath = this.recordPath(sessionId, inputPath);

    return this.deps.fs
      .readFileUtf8(filePath)
      .map((raw): string | null => raw)
      .orElse((e) => {
        if (e.code === 'FS_NOT_FOUND') return okAsync(null);
        return errAsync(EngineErr.sessionCorrupt(filePath, `Cannot read session record: ${e.message}`));
      })
      .andThen((raw) => {
        if (raw === null) return okAsync(null);

        let parsed: unknown;
        try {
          parsed = JSON.parse(raw);
        } catch {
          return errAsync(EngineErr.sessionCorrupt(filePath, `Invalid JSON in session record: ${filePath}`));
        }

        const validated = SessionRecordV1Schema.safeParse(parsed);
        if (!validated.success) {
          const issue = validated.error.issues[0];
          const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'schema mismatch';
          return errAsync(EngineErr.sessionCorrupt(filePath, `Session record is invalid (${where}): ${filePath}`));
        }
        if (validated.data.sessionId !== sessionId || validated.data.inputPath !== inputPath) {
          return errAsync(
            EngineErr.sessionCorrupt(filePath, `Session record at ${filePath} belongs to a different session or input`)
          );
        }

        return this.reconcile(validated.data);
      });
  }

  save(record: SessionRecord): ResultAsync<void, StorageUnwritableError> {
    const filePath = this.recordPath(record.sessionId, record.inputPath);
    const bytes = utf8Bytes(`${JSON.stringify(record, null, 2)}\n`);

    return writeFileAtomic(this.deps.fs, filePath, bytes, `${process.pid}-${this.deps.clock.nowMs()}`).mapErr((e) =>
      EngineErr.storageUnwritable(filePath, `Cannot write session record: ${e.message}`)
    );
  }

  private reconcile(stored: SessionRecord): ResultAsync<LoadedSession, SessionStoreError> {
    return this.deps.probe.probe(stored.planningDir).andThen((markers) =>
      fingerprintFile(stored.inputPath, this.deps).map((current): LoadedSession => {
        const drift: InputDriftedWarning | null =
          current === stored.inputFingerprint
            ? null
            : {
                kind: 'InputDrifted',
                path: stored.inputPath,
                storedFingerprint: stored.inputFingerprint,
                currentFingerprint: current,
                message: `Input file has changed since session started: ${stored.inputPath}`,
              };

        return {
          record: { ...stored, stepMarkers: toStoredMarkers(markers) },
          markers,
          drift,
        };
      })
    );
  }
}

import { okAsync, type ResultAsync } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import type { Sha256Port } from '../ports/sha256.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { ArtifactProbePort } from '../ports/artifact-probe.port.js';
import type { LoadedSession, SessionStoreError, SessionStorePort } from '../ports/session-store.port.js';
import type { TaskSinkPort, TaskWriteSummary } from '../ports/task-sink.port.js';
import { SESSION_RECORD_SCHEMA_VERSION } from '../durable-core/constants.js';
import type { EngineWarning, InputUnavailableError, StorageUnwritableError } from '../durable-core/errors.js';
import { asSessionId, type SessionId, type Sha256Digest } from '../durable-core/ids/index.js';
import {
  resolveResumeStep,
  splitProgress,
  type PipelineStep,
  type SplitProgress,
  type StepMarkers,
} from '../durable-core/domain/resume-resolver.js';
import { localSessionIdFor } from '../durable-core/domain/session-keys.js';
import { buildTaskPlan } from '../durable-core/domain/task-plan.js';
import { toStoredMarkers, type SessionRecord } from '../durable-core/schemas/session/index.js';
import { resolveTaskListContext, type TaskListContext } from './resolve-task-list-context.js';
import { validateInput, type ValidatedInput } from './validate-input.js';

export interface SetupSessionInput {
  readonly inputFile: string;
  /** Explicit session id; wins over the environment. */
  readonly sessionId?: string;
  /** Adopt the current input bytes as the session's fingerprint. */
  readonly acceptInputChange: boolean;
}

export interface SetupSessionEnv {
  readonly sessionId?: string;
  readonly taskListId?: string;
  readonly disableTasks: boolean;
}

export interface SetupSessionDeps {
  readonly fs: FileSystemPort;
  readonly sha256: Sha256Port;
  readonly clock: TimeClockPort;
  readonly store: SessionStorePort;
  readonly probe: ArtifactProbePort;
  readonly taskSink: TaskSinkPort;
  readonly logger: Logger;
}

export type TaskPublication =
  | { readonly kind: 'published'; readonly summary: TaskWriteSummary; readonly context: TaskListContext }
  | {
      readonly kind: 'skipped';
      readonly reason: 'disabled' | 'no_task_list_id' | 'sink_failed';
      readonly context: TaskListContext;
    };

export interface SetupSessionOutcome {
  readonly mode: 'new' | 'resume';
  readonly sessionId: SessionId;
  /** True when no session id was available and a per-input local one was derived. */
  readonly localNamespace: boolean;
  readonly inputPath: string;
  readonly planningDir: string;
  readonly inputFingerprint: Sha256Digest;
  readonly resumeStep: PipelineStep;
  /** Step stored by the previous invocation, if any. Informational only. */
  readonly previousStep: PipelineStep | null;
  readonly markers: StepMarkers;
  readonly progress: readonly SplitProgress[];
  readonly tasks: TaskPublication;
  readonly warnings: readonly EngineWarning[];
}

export type SetupSessionError = InputUnavailableError | SessionStoreError | StorageUnwritableError;

interface Reconciled {
  readonly mode: 'new' | 'resume';
  readonly markers: StepMarkers;
  readonly fingerprint: Sha256Digest;
  readonly createdAt: string;
  readonly previousStep: PipelineStep | null;
}

/**
 * Entry point for every (re-)invocation: validate the input, load or create the
 * session, reconcile it against the planning directory, resolve the step to run
 * and persist the result. Publishing the task plan is best-effort.
 */
export function setupSession(
  input: SetupSessionInput,
  env: SetupSessionEnv,
  deps: SetupSessionDeps
): ResultAsync<SetupSessionOutcome, SetupSessionError> {
  const warnings: EngineWarning[] = [];
  const now = new Date(deps.clock.nowMs()).toISOString();

  return validateInput(input.inputFile, deps).andThen((validated) => {
    const explicit = input.sessionId?.trim() || env.sessionId?.trim() || null;
    const sessionId = explicit ? asSessionId(explicit) : localSessionIdFor(validated.inputPath, deps.sha256);

    if (!explicit) {
      warnings.push({
        kind: 'SessionNamespaceUnavailable',
        message: `No session id available; using local namespace ${sessionId}`,
      });
      deps.logger.warn({ sessionId }, 'No session id in arguments or environment');
    }

    return deps.store
      .load(sessionId, validated.inputPath)
      .andThen((loaded) =>
        loaded
          ? okAsync(reconcileLoaded(loaded, validated, input.acceptInputChange, warnings, deps.logger))
          : deps.probe.probe(validated.planningDir).map(
              (markers): Reconciled => ({
                mode: 'new',
                markers,
                fingerprint: validated.fingerprint,
                createdAt: now,
                previousStep: null,
              })
            )
      )
      .andThen((state) => {
        if (state.markers.manifest.kind === 'malformed') {
          const { reason, message } = state.markers.manifest.error;
          warnings.push({ kind: 'ManifestMalformed', reason, message });
        }

        const resumeStep = resolveResumeStep(state.markers);
        const record: SessionRecord = {
          v: SESSION_RECORD_SCHEMA_VERSION,
          sessionId,
          inputPath: validated.inputPath,
          inputFingerprint: state.fingerprint,
          planningDir: validated.planningDir,
          createdAt: state.createdAt,
          updatedAt: now,
          lastResolvedStep: resumeStep,
          stepMarkers: toStoredMarkers(state.markers),
        };

        deps.logger.info({ sessionId, mode: state.mode, resumeStep }, 'Session resolved');

        return deps.store
          .save(record)
          .andThen(() => publishTasks(record, resumeStep, input, env, warnings, deps))
          .map(
            (tasks): SetupSessionOutcome => ({
              mode: state.mode,
              sessionId,
              localNamespace: !explicit,
              inputPath: validated.inputPath,
              planningDir: validated.planningDir,
              inputFingerprint: state.fingerprint,
              resumeStep,
              previousStep: state.previousStep,
              markers: state.markers,
              progress: splitProgress(state.markers),
              tasks,
              warnings,
            })
          );
      });
  });
}

function reconcileLoaded(
  loaded: LoadedSession,
  validated: ValidatedInput,
  acceptInputChange: boolean,
  warnings: EngineWarning[],
  logger: Logger
): Reconciled {
  const base = {
    mode: 'resume' as const,
    markers: loaded.markers,
    createdAt: loaded.record.createdAt,
    previousStep: loaded.record.lastResolvedStep,
  };

  if (!loaded.drift) return { ...base, fingerprint: loaded.record.inputFingerprint };

  if (acceptInputChange) {
    logger.info({ path: loaded.drift.path }, 'Input change accepted; fingerprint updated');
    return { ...base, fingerprint: validated.fingerprint };
  }

  warnings.push(loaded.drift);
  logger.warn({ path: loaded.drift.path }, 'Input file changed since session started');
  return { ...base, fingerprint: loaded.record.inputFingerprint };
}

function publishTasks(
  record: SessionRecord,
  step: PipelineStep,
  input: SetupSessionInput,
  env: SetupSessionEnv,
  warnings: EngineWarning[],
  deps: SetupSessionDeps
): ResultAsync<TaskPublication, never> {
  const context = resolveTaskListContext(input.sessionId, { taskListId: env.taskListId, sessionId: env.sessionId });

  if (env.disableTasks) {
    deps.logger.debug('Task publication disabled');
    return okAsync<TaskPublication>({ kind: 'skipped', reason: 'disabled', context });
  }

  if (context.taskListId === null) {
    warnings.push({ kind: 'TaskPublishSkipped', message: 'No task list id available; task list not published' });
    deps.logger.warn('Task publication skipped: no task list id');
    return okAsync<TaskPublication>({ kind: 'skipped', reason: 'no_task_list_id', context });
  }

  const plan = buildTaskPlan(step, {
    planningDir: record.planningDir,
    inputPath: record.inputPath,
    sessionId: record.sessionId,
  });

  return deps.taskSink
    .writeTasks(context.taskListId, plan)
    .map((summary): TaskPublication => ({ kind: 'published', summary, context }))
    .orElse((e) => {
      warnings.push({ kind: 'TaskPublishSkipped', message: `Task list not published: ${e.message}` });
      deps.logger.warn({ code: e.code }, 'Task publication failed');
      return okAsync<TaskPublication>({ kind: 'skipped', reason: 'sink_failed', context });
    });
}

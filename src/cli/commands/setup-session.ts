/**
 * setup-session: load or create the session for an input document, reconcile
 * it with the planning directory and report the step to run next.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import type { SetupSessionError, SetupSessionInput, SetupSessionOutcome, TaskPublication } from '../../engine/usecases/setup-session.js';
import { entryDirName } from '../../engine/durable-core/domain/manifest-codec.js';
import { formatEngineWarning } from '../../errors/formatter.js';
import { assertNever } from '../../runtime/assert-never.js';
import { engineFailure } from './engine-failure.js';

export interface SetupSessionCommandDeps {
  readonly setupSession: (input: SetupSessionInput) => ResultAsync<SetupSessionOutcome, SetupSessionError>;
}

export interface SetupSessionCommandOptions {
  readonly sessionId?: string;
  readonly acceptInputChange?: boolean;
}

export async function executeSetupSessionCommand(
  inputFile: string,
  options: SetupSessionCommandOptions,
  deps: SetupSessionCommandDeps
): Promise<CliResult> {
  const result = await deps.setupSession({
    inputFile,
    sessionId: options.sessionId,
    acceptInputChange: options.acceptInputChange ?? false,
  });

  if (result.isErr()) return engineFailure(result.error);
  const outcome = result.value;

  return success(
    {
      success: true,
      mode: outcome.mode,
      sessionId: outcome.sessionId,
      localNamespace: outcome.localNamespace,
      inputPath: outcome.inputPath,
      planningDir: outcome.planningDir,
      inputFingerprint: outcome.inputFingerprint,
      resumeStep: outcome.resumeStep,
      previousStep: outcome.previousStep,
      artifacts: {
        interviewComplete: outcome.markers.interviewComplete,
        manifest: outcome.markers.manifest.kind,
        splitDirs: outcome.markers.splitDirs,
        splitsWithSpecs: outcome.markers.splitsWithSpecs,
      },
      splits: outcome.progress.map((p) => ({
        split: entryDirName(p.entry),
        directory: p.dirName,
        hasSpec: p.hasSpec,
      })),
      tasks: tasksPayload(outcome.tasks),
      warnings: outcome.warnings,
    },
    {
      message: `${outcome.mode === 'new' ? 'New session' : 'Resumed session'} ${outcome.sessionId}: next step is ${outcome.resumeStep}`,
      details: [
        `Input: ${outcome.inputPath}`,
        `Planning dir: ${outcome.planningDir}`,
        ...outcome.progress.map(
          (p) => `${entryDirName(p.entry)}: ${p.dirName === null ? 'not created' : p.hasSpec ? 'spec written' : 'awaiting spec'}`
        ),
      ],
      warnings: outcome.warnings.map(formatEngineWarning),
    }
  );
}

function tasksPayload(tasks: TaskPublication): Record<string, unknown> {
  switch (tasks.kind) {
    case 'published':
      return {
        published: true,
        taskListId: tasks.summary.taskListId,
        source: tasks.context.source,
        tasksWritten: tasks.summary.tasksWritten,
        tasksDir: tasks.summary.tasksDir,
        obsoleted: tasks.summary.obsoleted,
      };
    case 'skipped':
      return { published: false, reason: tasks.reason, source: tasks.context.source };
    default:
      return assertNever(tasks);
  }
}

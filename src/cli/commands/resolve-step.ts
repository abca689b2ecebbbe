/**
 * resolve-step: read-only view of where a planning directory stands.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import type { ResolvedStep } from '../../engine/usecases/resolve-step.js';
import type { StorageUnwritableError } from '../../engine/durable-core/errors.js';
import { entryDirName } from '../../engine/durable-core/domain/manifest-codec.js';
import { engineFailure } from './engine-failure.js';

export interface ResolveStepCommandDeps {
  readonly resolveStep: (planningDir: string) => ResultAsync<ResolvedStep, StorageUnwritableError>;
}

export async function executeResolveStepCommand(planningDir: string, deps: ResolveStepCommandDeps): Promise<CliResult> {
  const result = await deps.resolveStep(planningDir);
  if (result.isErr()) return engineFailure(result.error);

  const { step, markers, progress } = result.value;
  const manifestError = markers.manifest.kind === 'malformed' ? markers.manifest.error : null;

  return success(
    {
      success: true,
      planningDir: result.value.planningDir,
      resumeStep: step,
      artifacts: {
        interviewComplete: markers.interviewComplete,
        manifest: markers.manifest.kind,
        splitDirs: markers.splitDirs,
        splitsWithSpecs: markers.splitsWithSpecs,
      },
      manifestError,
      splits: progress.map((p) => ({ split: entryDirName(p.entry), directory: p.dirName, hasSpec: p.hasSpec })),
    },
    {
      message: `Next step: ${step}`,
      details: [
        `Interview: ${markers.interviewComplete ? 'done' : 'missing'}`,
        `Manifest: ${markers.manifest.kind}`,
        `Split directories: ${markers.splitDirs.length}, with specs: ${markers.splitsWithSpecs.length}`,
      ],
      warnings: manifestError ? [manifestError.message] : undefined,
    }
  );
}

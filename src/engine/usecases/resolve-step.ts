import * as path from 'path';
import type { ResultAsync } from 'neverthrow';
import type { ArtifactProbePort } from '../ports/artifact-probe.port.js';
import type { StorageUnwritableError } from '../durable-core/errors.js';
import {
  resolveResumeStep,
  splitProgress,
  type PipelineStep,
  type SplitProgress,
  type StepMarkers,
} from '../durable-core/domain/resume-resolver.js';

export interface ResolvedStep {
  readonly planningDir: string;
  readonly step: PipelineStep;
  readonly markers: StepMarkers;
  readonly progress: readonly SplitProgress[];
}

/** Read-only: probe the planning directory and resolve the step. Writes nothing. */
export function resolveStep(planningDir: string, probe: ArtifactProbePort): ResultAsync<ResolvedStep, StorageUnwritableError> {
  const root = path.resolve(planningDir);
  return probe.probe(root).map((markers) => ({
    planningDir: root,
    step: resolveResumeStep(markers),
    markers,
    progress: splitProgress(markers),
  }));
}

import type { ManifestMalformedError } from '../errors.js';
import type { SplitDirName } from '../ids/index.js';
import { candidateDirNames } from './naming.js';
import { entriesInIndexOrder, entryDirName, type ManifestEntry, type SplitManifest } from './manifest-codec.js';

/**
 * The fixed pipeline, earliest stage first.
 */
export const PIPELINE_STEPS = [
  'interview',
  'split-analysis',
  'confirmation',
  'directory-creation',
  'spec-generation',
  'complete',
] as const;

export type PipelineStep = (typeof PIPELINE_STEPS)[number];

export type ManifestMarker =
  | { readonly kind: 'absent' }
  | { readonly kind: 'malformed'; readonly error: ManifestMalformedError }
  | { readonly kind: 'present'; readonly manifest: SplitManifest };

/**
 * What the artifact probe observed on disk. Derived, never authoritative on its own:
 * a fresh probe always wins over a stored copy.
 */
export interface StepMarkers {
  /** Interview transcript exists and is non-empty. */
  readonly interviewComplete: boolean;
  readonly manifest: ManifestMarker;
  /** Every `NN-name` directory under `splits/`, in index order. */
  readonly splitDirs: readonly SplitDirName[];
  /** Subset of `splitDirs` holding a non-empty spec file. */
  readonly splitsWithSpecs: readonly SplitDirName[];
}

export interface SplitProgress {
  readonly entry: ManifestEntry;
  /** Directory the entry was materialized at (possibly disambiguated), or null. */
  readonly dirName: SplitDirName | null;
  readonly hasSpec: boolean;
}

/**
 * Match each manifest entry to the directory it lives in, if any.
 * Directories not named by the manifest are ignored.
 */
export function splitProgress(markers: StepMarkers): readonly SplitProgress[] {
  if (markers.manifest.kind !== 'present') return [];

  const dirs = new Set<string>(markers.splitDirs);
  const specs = new Set<string>(markers.splitsWithSpecs);

  return entriesInIndexOrder(markers.manifest.manifest).map((entry) => {
    const dirName = candidateDirNames(entryDirName(entry)).find((c) => dirs.has(c)) ?? null;
    return { entry, dirName, hasSpec: dirName !== null && specs.has(dirName) };
  });
}

/**
 * Map observed artifacts to the step execution continues from.
 * Checked earliest stage first, so an interruption between stages resolves
 * to the next action rather than the furthest artifact.
 */
export function resolveResumeStep(markers: StepMarkers): PipelineStep {
  if (!markers.interviewComplete) return 'interview';
  if (markers.manifest.kind !== 'present') return 'split-analysis';

  const progress = splitProgress(markers);
  if (progress.every((p) => p.dirName === null)) return 'confirmation';
  if (progress.some((p) => p.dirName === null)) return 'directory-creation';
  if (progress.some((p) => !p.hasSpec)) return 'spec-generation';
  return 'complete';
}

export function stepOrdinal(step: PipelineStep): number {
  return PIPELINE_STEPS.indexOf(step);
}

import type { ResultAsync } from 'neverthrow';
import type { StepMarkers } from '../durable-core/domain/resume-resolver.js';
import type { StorageUnwritableError } from '../durable-core/errors.js';

/**
 * Port: observe which pipeline artifacts exist in a planning directory.
 *
 * Checks, earliest stage first:
 * - interview transcript present and non-empty
 * - manifest document present and decodable
 * - `splits/NN-name/` directories present
 * - each split's spec file present and non-empty
 *
 * Missing artifacts are data (false / empty), not errors. Only an unreadable
 * planning directory fails.
 */
export interface ArtifactProbePort {
  probe(planningDir: string): ResultAsync<StepMarkers, StorageUnwritableError>;
}

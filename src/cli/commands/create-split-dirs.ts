/**
 * create-split-dirs: materialize the confirmed manifest as `splits/NN-name/` directories.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import type { MaterializeError, MaterializeOutcome } from '../../engine/usecases/materialize-splits.js';
import type { ManifestMalformedError } from '../../engine/durable-core/errors.js';
import { formatEngineWarning } from '../../errors/formatter.js';
import { engineFailure } from './engine-failure.js';

export interface CreateSplitDirsCommandDeps {
  readonly materialize: (
    planningDir: string
  ) => ResultAsync<MaterializeOutcome, MaterializeError | ManifestMalformedError>;
}

export async function executeCreateSplitDirsCommand(
  planningDir: string,
  deps: CreateSplitDirsCommandDeps
): Promise<CliResult> {
  const result = await deps.materialize(planningDir);
  if (result.isErr()) return engineFailure(result.error);

  const { created, skipped, renamed } = result.value;

  return success(
    { success: true, created, skipped, renamed },
    {
      message: `Created ${created.length} split director${created.length === 1 ? 'y' : 'ies'}, ${skipped.length} already present`,
      details: [...created.map((d) => `created ${d}`), ...skipped.map((d) => `exists  ${d}`)],
      warnings: renamed.map(formatEngineWarning),
    }
  );
}

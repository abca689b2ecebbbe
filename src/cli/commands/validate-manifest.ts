/**
 * validate-manifest: structural check of project-manifest.md.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import type { ManifestCheck } from '../../engine/usecases/check-manifest.js';
import type { ManifestMalformedError, StorageUnwritableError } from '../../engine/durable-core/errors.js';
import { engineFailure } from './engine-failure.js';

export interface ValidateManifestCommandDeps {
  readonly checkManifest: (planningDir: string) => ResultAsync<ManifestCheck, ManifestMalformedError | StorageUnwritableError>;
}

export async function executeValidateManifestCommand(
  planningDir: string,
  deps: ValidateManifestCommandDeps
): Promise<CliResult> {
  const result = await deps.checkManifest(planningDir);
  if (result.isErr()) return engineFailure(result.error);

  const { manifestPath, splits } = result.value;
  return success(
    { success: true, valid: true, manifestPath, splits },
    { message: `Manifest is valid: ${splits.length} split${splits.length === 1 ? '' : 's'}`, details: [...splits] }
  );
}

/**
 * next-index: the `NN-name` a new split would get, without touching the manifest.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { misuse, success } from '../types/cli-result.js';
import type { ProposeSplitError, ProposedSplit } from '../../engine/usecases/propose-split.js';
import { engineFailure } from './engine-failure.js';

export interface NextIndexCommandDeps {
  readonly proposeSplit: (planningDir: string, title: string) => ResultAsync<ProposedSplit, ProposeSplitError>;
}

export async function executeNextIndexCommand(
  planningDir: string,
  title: string | undefined,
  deps: NextIndexCommandDeps
): Promise<CliResult> {
  if (!title || title.trim().length === 0) {
    return misuse('A split title is required', ['Pass --title "<split title>"']);
  }

  const result = await deps.proposeSplit(planningDir, title);
  if (result.isErr()) return engineFailure(result.error);

  const proposed = result.value;
  return success(
    {
      success: true,
      index: proposed.index,
      name: proposed.name,
      dirName: proposed.dirName,
      sanitized: proposed.sanitized,
      manifestBlock: proposed.manifestBlock,
    },
    {
      message: `Next split: ${proposed.dirName}`,
      warnings: proposed.sanitized ? [`Title '${title}' was normalized to '${proposed.name}'`] : undefined,
    }
  );
}

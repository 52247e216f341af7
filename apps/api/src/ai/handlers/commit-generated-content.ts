import { ContentSource, ContractStatus } from '@clm/database';
import type { JobContext } from '../../jobs/interfaces/job-handler.interface';
import { ContractsService } from '../../contracts/contracts.service';
import type { GeneratedContract } from '../generators/contract-generator';

export interface AiGenerationResult extends Record<string, unknown> {
  contractId: string;
  /** Contract row version after the transition */
  version: number;
  contentVersion: number;
  model: string;
  missingPlaceholders: string[];
}

/**
 * Moves the contract to GENERATED with `generated` as a new AI content
 * version. Nothing is written once the job's signal has been aborted.
 */
export async function commitGeneratedContent(
  contractsService: ContractsService,
  contractId: string,
  generated: GeneratedContract,
  context: JobContext,
): Promise<AiGenerationResult> {
  context.signal.throwIfAborted();
  const outcome = await contractsService.transition(
    contractId,
    ContractStatus.GENERATED,
    context.requestedBy,
    {
      content: { content: generated.content, source: ContentSource.AI },
      signal: context.signal,
    },
  );

  return {
    contractId,
    version: outcome.contract.version,
    contentVersion: outcome.contentVersion?.version ?? 0,
    model: generated.model,
    missingPlaceholders: generated.missingPlaceholders,
  };
}

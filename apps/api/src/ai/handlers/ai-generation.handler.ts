import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { JobKind } from '@clm/database';
import { JobHandlerRegistry } from '../../jobs/job-handler.registry';
import type { JobContext, JobHandler } from '../../jobs/interfaces/job-handler.interface';
import { ContractsService } from '../../contracts/contracts.service';
import { TemplatesService } from '../../templates/templates.service';
import { ContractGenerator } from '../generators/contract-generator';
import { GenerateContractDto } from '../dto/generate-contract.dto';
import { GenerationInputsInvalidException } from '../exceptions/ai.exceptions';
import { AiGenerationResult, commitGeneratedContent } from './commit-generated-content';

export const DEFAULT_JURISDICTION = 'US';

/**
 * AI_GENERATION jobs: generate content for the contract's type and move the
 * contract to GENERATED with that content as a new AI version.
 *
 * The transition runs through ContractsService, so lifecycle checks,
 * history and optimistic concurrency apply exactly as for a manual change.
 */
@Injectable()
export class AiGenerationHandler
  implements JobHandler<GenerateContractDto, AiGenerationResult>, OnModuleInit
{
  readonly kind = JobKind.AI_GENERATION;
  readonly parametersType = GenerateContractDto;

  private readonly logger = new Logger(AiGenerationHandler.name);

  constructor(
    private readonly registry: JobHandlerRegistry,
    private readonly contractsService: ContractsService,
    private readonly templatesService: TemplatesService,
    private readonly generator: ContractGenerator,
  ) {}

  onModuleInit(): void {
    this.registry.register(this);
  }

  async run(
    parameters: GenerateContractDto,
    context: JobContext,
  ): Promise<AiGenerationResult> {
    const contract = await this.contractsService.getOwned(
      parameters.contractId,
      context.requestedBy,
    );

    const report = this.templatesService.validateInputs(
      contract.contractType,
      parameters.inputs,
    );
    if (!report.valid) {
      throw new GenerationInputsInvalidException(report.errors);
    }

    const generated = await this.generator.generate(
      {
        contractType: contract.contractType,
        inputs: parameters.inputs,
        jurisdiction: parameters.jurisdiction ?? DEFAULT_JURISDICTION,
      },
      context.signal,
    );

    const result = await commitGeneratedContent(
      this.contractsService,
      contract.id,
      generated,
      context,
    );
    this.logger.log(
      `Contract ${contract.id} generated by ${generated.model} (content v${result.contentVersion})`,
    );
    return result;
  }
}

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { JobKind } from '@clm/database';
import { JobHandlerRegistry } from '../../jobs/job-handler.registry';
import type { JobContext, JobHandler } from '../../jobs/interfaces/job-handler.interface';
import { ContractsService } from '../../contracts/contracts.service';
import { TemplatesService } from '../../templates/templates.service';
import { ContractGenerator } from '../generators/contract-generator';
import { RegenerateContractDto } from '../dto/regenerate-contract.dto';
import {
  GenerationInputsInvalidException,
  NothingToReviseException,
} from '../exceptions/ai.exceptions';
import { AiGenerationResult, commitGeneratedContent } from './commit-generated-content';
import { DEFAULT_JURISDICTION } from './ai-generation.handler';

/**
 * AI_REGENERATION jobs: rework the contract's content from user feedback.
 *
 * With preserveStructure (the default) the latest content is revised and
 * must exist. Otherwise generation starts again from the template, using
 * `inputs` when they are supplied.
 */
@Injectable()
export class AiRegenerationHandler
  implements JobHandler<RegenerateContractDto, AiGenerationResult>, OnModuleInit
{
  readonly kind = JobKind.AI_REGENERATION;
  readonly parametersType = RegenerateContractDto;

  private readonly logger = new Logger(AiRegenerationHandler.name);

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
    parameters: RegenerateContractDto,
    context: JobContext,
  ): Promise<AiGenerationResult> {
    const contract = await this.contractsService.getOwned(
      parameters.contractId,
      context.requestedBy,
    );
    const preserveStructure = parameters.preserveStructure ?? true;

    const latest = await this.contractsService.findLatestVersion(contract.id);
    if (preserveStructure && !latest) {
      throw new NothingToReviseException(contract.id);
    }

    if (parameters.inputs) {
      const report = this.templatesService.validateInputs(
        contract.contractType,
        parameters.inputs,
      );
      if (!report.valid) {
        throw new GenerationInputsInvalidException(report.errors);
      }
    }

    const revised = await this.generator.revise(
      {
        contractType: contract.contractType,
        content: latest?.content ?? '',
        feedback: parameters.feedback,
        preserveStructure,
        inputs: parameters.inputs,
        jurisdiction: parameters.jurisdiction ?? DEFAULT_JURISDICTION,
      },
      context.signal,
    );

    const result = await commitGeneratedContent(
      this.contractsService,
      contract.id,
      revised,
      context,
    );
    this.logger.log(
      `Contract ${contract.id} regenerated from feedback (content v${result.contentVersion})`,
    );
    return result;
  }
}

import { Module } from '@nestjs/common';
import { JobsModule } from '../jobs/jobs.module';
import { ContractsModule } from '../contracts/contracts.module';
import { TemplatesModule } from '../templates/templates.module';
import { AiController } from './ai.controller';
import { AiGenerationHandler } from './handlers/ai-generation.handler';
import { AiRegenerationHandler } from './handlers/ai-regeneration.handler';
import { ContractGenerator } from './generators/contract-generator';
import { TemplateContractGenerator } from './generators/template-contract-generator';

@Module({
  imports: [JobsModule, ContractsModule, TemplatesModule],
  controllers: [AiController],
  providers: [
    AiGenerationHandler,
    AiRegenerationHandler,
    { provide: ContractGenerator, useClass: TemplateContractGenerator },
  ],
})
export class AiModule {}

import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { JobKind } from '@clm/database';
import { CurrentUser, FirebaseAuthGuard, OptionalAuthGuard, OptionalUser } from '../auth';
import type { RequestUser } from '../auth';
import { JobsService } from '../jobs/jobs.service';
import { JobSubmittedDto } from '../jobs/dto/job-submitted.dto';
import { JobViewDto } from '../jobs/dto/job-view.dto';
import { TemplatesService } from '../templates/templates.service';
import { InputValidationReportDto } from '../templates/dto/input-validation-report.dto';
import { GenerateContractDto } from './dto/generate-contract.dto';
import { RegenerateContractDto } from './dto/regenerate-contract.dto';
import { ValidateInputDto } from './dto/validate-input.dto';

const POLL_BASE_PATH = '/ai/jobs';
const AI_JOB_KINDS = [JobKind.AI_GENERATION, JobKind.AI_REGENERATION] as const;

/**
 * Routes:
 *   POST /ai/generate-contract - submit an AI_GENERATION job (202)
 *   POST /ai/regenerate        - submit an AI_REGENERATION job with feedback (202)
 *   GET  /ai/jobs/:jobId       - poll either kind
 *   POST /ai/validate-input    - check inputs against a contract type; auth optional
 */
@Controller('ai')
export class AiController {
  private readonly logger = new Logger(AiController.name);

  constructor(
    private readonly jobsService: JobsService,
    private readonly templatesService: TemplatesService,
  ) {}

  @Post('generate-contract')
  @UseGuards(FirebaseAuthGuard)
  @HttpCode(HttpStatus.ACCEPTED)
  async generateContract(
    @Body() dto: GenerateContractDto,
    @CurrentUser() user: RequestUser,
  ): Promise<JobSubmittedDto> {
    const job = await this.jobsService.submit(JobKind.AI_GENERATION, dto, user.userId);
    return JobSubmittedDto.fromEntity(job, POLL_BASE_PATH);
  }

  @Post('regenerate')
  @UseGuards(FirebaseAuthGuard)
  @HttpCode(HttpStatus.ACCEPTED)
  async regenerate(
    @Body() dto: RegenerateContractDto,
    @CurrentUser() user: RequestUser,
  ): Promise<JobSubmittedDto> {
    const job = await this.jobsService.submit(JobKind.AI_REGENERATION, dto, user.userId);
    return JobSubmittedDto.fromEntity(job, POLL_BASE_PATH);
  }

  @Get('jobs/:jobId')
  @UseGuards(FirebaseAuthGuard)
  getJob(
    @Param('jobId') jobId: string,
    @CurrentUser() user: RequestUser,
  ): Promise<JobViewDto> {
    return this.jobsService.getStatus(jobId, user.userId, AI_JOB_KINDS);
  }

  @Post('validate-input')
  @UseGuards(OptionalAuthGuard)
  @HttpCode(HttpStatus.OK)
  validateInput(
    @Body() dto: ValidateInputDto,
    @OptionalUser() user: RequestUser | null,
  ): InputValidationReportDto {
    this.logger.debug(
      `Validating ${dto.contractType} inputs for ${user?.userId ?? 'anonymous caller'}`,
    );
    return this.templatesService.validateInputs(dto.contractType, dto.inputs);
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { instanceToPlain, plainToInstance } from 'class-transformer';
import { isUUID, validate } from 'class-validator';
import type { AsyncJob, JobKind } from '@clm/database';
import { JobsRepository } from './repositories/jobs.repository';
import { JobHandlerRegistry } from './job-handler.registry';
import { JobRunner } from './job-runner.service';
import { JobViewDto } from './dto/job-view.dto';
import {
  JobNotFoundException,
  JobParametersInvalidException,
} from './exceptions/job.exceptions';
import { flattenValidationErrors } from './utils/flatten-validation-errors';

/**
 * JobsService - the tracker's public face.
 *
 * `submit` returns as soon as the PENDING row is committed; execution is
 * handed to JobRunner. `getStatus` is a plain read and never waits on work.
 */
@Injectable()
export class JobsService {
  private readonly logger = new Logger(JobsService.name);

  constructor(
    private readonly jobs: JobsRepository,
    private readonly registry: JobHandlerRegistry,
    private readonly runner: JobRunner,
  ) {}

  async submit(
    kind: JobKind,
    parameters: object,
    requestedBy: string,
  ): Promise<AsyncJob> {
    const handler = this.registry.get(kind);

    const instance = plainToInstance(handler.parametersType, parameters);
    const errors = await validate(instance, {
      whitelist: true,
      forbidNonWhitelisted: true,
    });
    if (errors.length > 0) {
      throw new JobParametersInvalidException(flattenValidationErrors(errors));
    }

    const job = await this.jobs.create({
      kind,
      parameters: instanceToPlain(instance),
      requestedBy,
    });
    this.logger.log(`Job ${job.id} (${kind}) submitted by ${requestedBy}`);

    this.runner.schedule(job.id);
    return job;
  }

  /**
   * @param kinds when given, jobs of any other kind are reported as missing
   * @throws JobNotFoundException for unknown ids and other users' jobs
   */
  async getStatus(
    jobId: string,
    requesterId: string,
    kinds?: readonly JobKind[],
  ): Promise<JobViewDto> {
    if (!isUUID(jobId)) {
      throw new JobNotFoundException(jobId);
    }

    const job = await this.jobs.findById(jobId);
    if (!job || job.requestedBy !== requesterId || (kinds && !kinds.includes(job.kind))) {
      throw new JobNotFoundException(jobId);
    }

    return JobViewDto.fromEntity(job);
  }
}

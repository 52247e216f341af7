import type { AsyncJob, JobError, JobKind, JobStatus } from '@clm/database';

/**
 * Poll response for a job. `result` appears only once SUCCEEDED,
 * `error` only once FAILED.
 */
export class JobViewDto {
  jobId!: string;
  kind!: JobKind;
  status!: JobStatus;
  result?: Record<string, unknown>;
  error?: JobError;
  createdAt!: string;
  updatedAt!: string;
  startedAt?: string;
  completedAt?: string;

  static fromEntity(job: AsyncJob): JobViewDto {
    const dto = new JobViewDto();
    dto.jobId = job.id;
    dto.kind = job.kind;
    dto.status = job.status;
    dto.result = job.result ?? undefined;
    dto.error = job.error ?? undefined;
    dto.createdAt = job.createdAt.toISOString();
    dto.updatedAt = job.updatedAt.toISOString();
    dto.startedAt = job.startedAt?.toISOString();
    dto.completedAt = job.completedAt?.toISOString();
    return dto;
  }
}

import type { AsyncJob, JobStatus } from '@clm/database';

/** 202 body returned by every job-submitting endpoint. */
export class JobSubmittedDto {
  jobId!: string;
  status!: JobStatus;
  /** Relative URL the client should poll */
  pollUrl!: string;

  static fromEntity(job: AsyncJob, pollBasePath: string): JobSubmittedDto {
    const dto = new JobSubmittedDto();
    dto.jobId = job.id;
    dto.status = job.status;
    dto.pollUrl = `${pollBasePath}/${job.id}`;
    return dto;
  }
}

import { randomUUID } from 'crypto';
import { AsyncJob, JobStatus } from '@clm/database';
import type { JobError } from '@clm/database';
import { JobsRepository, NewJob } from '../../src/jobs/repositories/jobs.repository';

/**
 * JobsRepository over a map, with the same conditional status writes as
 * the SQL version. Every status a job takes is recorded in `statusLog`.
 */
export class InMemoryJobsRepository extends JobsRepository {
  private readonly jobs = new Map<string, AsyncJob>();
  readonly statusLog = new Map<string, JobStatus[]>();

  async create(input: NewJob): Promise<AsyncJob> {
    const now = new Date();
    const job = Object.assign(new AsyncJob(), {
      id: randomUUID(),
      kind: input.kind,
      status: JobStatus.PENDING,
      parameters: input.parameters,
      result: null,
      error: null,
      requestedBy: input.requestedBy,
      startedAt: null,
      completedAt: null,
      createdAt: now,
      updatedAt: now,
    });
    this.jobs.set(job.id, job);
    this.statusLog.set(job.id, [JobStatus.PENDING]);
    return clone(job);
  }

  async findById(id: string): Promise<AsyncJob | null> {
    const job = this.jobs.get(id);
    return job ? clone(job) : null;
  }

  async markRunning(id: string, startedAt: Date): Promise<AsyncJob | null> {
    const job = this.jobs.get(id);
    if (!job || job.status !== JobStatus.PENDING) {
      return null;
    }
    this.setStatus(job, JobStatus.RUNNING, startedAt);
    job.startedAt = startedAt;
    return clone(job);
  }

  async markSucceeded(
    id: string,
    result: Record<string, unknown>,
    completedAt: Date,
  ): Promise<boolean> {
    const job = this.jobs.get(id);
    if (!job || job.status !== JobStatus.RUNNING) {
      return false;
    }
    this.setStatus(job, JobStatus.SUCCEEDED, completedAt);
    job.result = result;
    job.completedAt = completedAt;
    return true;
  }

  async markFailed(id: string, error: JobError, completedAt: Date): Promise<boolean> {
    const job = this.jobs.get(id);
    if (!job || (job.status !== JobStatus.PENDING && job.status !== JobStatus.RUNNING)) {
      return false;
    }
    this.setStatus(job, JobStatus.FAILED, completedAt);
    job.error = error;
    job.completedAt = completedAt;
    return true;
  }

  async findStale(cutoff: Date, limit: number): Promise<AsyncJob[]> {
    return [...this.jobs.values()]
      .filter(
        (job) =>
          (job.status === JobStatus.PENDING && job.createdAt < cutoff) ||
          (job.status === JobStatus.RUNNING && job.startedAt !== null && job.startedAt < cutoff),
      )
      .slice(0, limit)
      .map(clone);
  }

  private setStatus(job: AsyncJob, status: JobStatus, at: Date): void {
    job.status = status;
    job.updatedAt = at;
    this.statusLog.get(job.id)?.push(status);
  }
}

function clone(job: AsyncJob): AsyncJob {
  return Object.assign(new AsyncJob(), job);
}

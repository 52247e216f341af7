import { Injectable } from '@nestjs/common';
import { DataSource, ObjectLiteral, Repository } from 'typeorm';
import type { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import { AsyncJob, JobStatus } from '@clm/database';
import type { JobError } from '@clm/database';
import { JobsRepository, NewJob } from './jobs.repository';

@Injectable()
export class TypeOrmJobsRepository extends JobsRepository {
  private readonly repository: Repository<AsyncJob>;

  constructor(dataSource: DataSource) {
    super();
    this.repository = dataSource.getRepository(AsyncJob);
  }

  async create(input: NewJob): Promise<AsyncJob> {
    const job = this.repository.create({
      ...input,
      status: JobStatus.PENDING,
      result: null,
      error: null,
      startedAt: null,
      completedAt: null,
    });
    return this.repository.save(job);
  }

  findById(id: string): Promise<AsyncJob | null> {
    return this.repository.findOne({ where: { id } });
  }

  async markRunning(id: string, startedAt: Date): Promise<AsyncJob | null> {
    const claimed = await this.transitionStatus(
      id,
      [JobStatus.PENDING],
      { status: JobStatus.RUNNING, startedAt },
    );
    return claimed ? this.findById(id) : null;
  }

  markSucceeded(
    id: string,
    result: Record<string, unknown>,
    completedAt: Date,
  ): Promise<boolean> {
    // jsonb goes through a bound parameter; pg serialises the object.
    return this.transitionStatus(
      id,
      [JobStatus.RUNNING],
      { status: JobStatus.SUCCEEDED, result: () => ':result', completedAt },
      { result },
    );
  }

  markFailed(id: string, error: JobError, completedAt: Date): Promise<boolean> {
    return this.transitionStatus(
      id,
      [JobStatus.PENDING, JobStatus.RUNNING],
      { status: JobStatus.FAILED, error, completedAt },
    );
  }

  findStale(cutoff: Date, limit: number): Promise<AsyncJob[]> {
    return this.repository
      .createQueryBuilder('job')
      .where('job.status = :pending AND job.created_at < :cutoff', {
        pending: JobStatus.PENDING,
        cutoff,
      })
      .orWhere('job.status = :running AND job.started_at < :cutoff', {
        running: JobStatus.RUNNING,
        cutoff,
      })
      .orderBy('job.created_at', 'ASC')
      .take(limit)
      .getMany();
  }

  // ── Helpers ────────────────────────────────────────────────

  /**
   * Single conditional UPDATE; `affected` tells whether the row was still
   * in one of the expected statuses.
   */
  private async transitionStatus(
    id: string,
    from: JobStatus[],
    changes: QueryDeepPartialEntity<AsyncJob>,
    parameters: ObjectLiteral = {},
  ): Promise<boolean> {
    const outcome = await this.repository
      .createQueryBuilder()
      .update(AsyncJob)
      .set(changes)
      .setParameters(parameters)
      .where('id = :id AND status IN (:...from)', { id, from })
      .execute();
    return (outcome.affected ?? 0) === 1;
  }
}

import type { AsyncJob, JobError, JobKind } from '@clm/database';

export interface NewJob {
  kind: JobKind;
  parameters: Record<string, unknown>;
  requestedBy: string;
}

/**
 * Persistence port for async jobs.
 *
 * Every status write is conditional on the current status, so the
 * forward-only rule holds even when the runner and the watchdog race:
 * the losing write simply reports `false` / `null`.
 */
export abstract class JobsRepository {
  /** Inserts a PENDING job; the row is committed when the promise resolves. */
  abstract create(input: NewJob): Promise<AsyncJob>;

  abstract findById(id: string): Promise<AsyncJob | null>;

  /** PENDING → RUNNING. Returns the claimed job, or null if it was not PENDING. */
  abstract markRunning(id: string, startedAt: Date): Promise<AsyncJob | null>;

  /** RUNNING → SUCCEEDED. */
  abstract markSucceeded(
    id: string,
    result: Record<string, unknown>,
    completedAt: Date,
  ): Promise<boolean>;

  /** PENDING | RUNNING → FAILED. */
  abstract markFailed(
    id: string,
    error: JobError,
    completedAt: Date,
  ): Promise<boolean>;

  /**
   * Jobs stuck before `cutoff`: PENDING created before it, or RUNNING
   * started before it.
   */
  abstract findStale(cutoff: Date, limit: number): Promise<AsyncJob[]>;
}

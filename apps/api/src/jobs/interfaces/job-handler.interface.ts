import type { ClassConstructor } from 'class-transformer';
import type { JobKind } from '@clm/database';

/** What a handler learns about the job it is executing. */
export interface JobContext {
  jobId: string;
  requestedBy: string;
  /** Aborted when the job's deadline passes. */
  signal: AbortSignal;
}

/** JSON object stored as a job's `result`. */
export type JobResult = Record<string, unknown>;

/**
 * Executes one kind of job.
 *
 * `parametersType` is a class-validator DTO; submissions are validated
 * against it before the job row is created, and the runner rebuilds an
 * instance of it from the stored parameters before calling `run`.
 */
export interface JobHandler<P extends object = object, R extends JobResult = JobResult> {
  readonly kind: JobKind;
  readonly parametersType: ClassConstructor<P>;
  run(parameters: P, context: JobContext): Promise<R>;
}

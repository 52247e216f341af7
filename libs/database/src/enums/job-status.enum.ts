/**
 * Status of an asynchronous job.
 *
 * Transitions:
 *   PENDING → RUNNING → SUCCEEDED
 *                     → FAILED
 *   PENDING → FAILED   (abandoned before a worker claimed it)
 *
 * SUCCEEDED and FAILED are terminal; a job never re-enters PENDING or RUNNING.
 */
export enum JobStatus {
  /** Job created and waiting for the runner */
  PENDING = 'PENDING',

  /** Runner claimed the job and the handler is executing */
  RUNNING = 'RUNNING',

  /** Handler finished; see AsyncJob.result */
  SUCCEEDED = 'SUCCEEDED',

  /** Handler failed, timed out or was abandoned; see AsyncJob.error */
  FAILED = 'FAILED',
}

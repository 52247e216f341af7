import type { JobError } from '@clm/database';
import { ApiException } from '../../common/exceptions/api.exception';
import { JobTimeoutError } from '../exceptions/job.exceptions';

/** Upper bound for messages stored on a job row */
const MAX_MESSAGE_LENGTH = 1000;

/**
 * Converts anything a handler throws into the structured error stored on a
 * FAILED job. Domain exceptions keep their code; everything else is JOB_FAILED.
 */
export function toJobError(error: unknown): JobError {
  if (error instanceof JobTimeoutError) {
    return { code: error.code, message: error.message };
  }

  if (error instanceof ApiException) {
    return { code: error.code, message: truncate(error.message) };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { code: 'JOB_FAILED', message: truncate(message || 'Job failed') };
}

function truncate(message: string): string {
  return message.length > MAX_MESSAGE_LENGTH
    ? `${message.slice(0, MAX_MESSAGE_LENGTH - 3)}...`
    : message;
}

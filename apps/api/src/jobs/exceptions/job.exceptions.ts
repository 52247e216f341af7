import { HttpStatus } from '@nestjs/common';
import { ApiException } from '../../common/exceptions/api.exception';

/**
 * Unknown job id, or a job submitted by someone else. Both map to 404 so
 * job ids cannot be enumerated.
 */
export class JobNotFoundException extends ApiException {
  constructor(jobId: string) {
    super(
      HttpStatus.NOT_FOUND,
      'Not Found',
      'NOT_FOUND',
      `Job "${jobId}" not found`,
    );
  }
}

/** Submission parameters failed validation for the job kind. */
export class JobParametersInvalidException extends ApiException {
  readonly details: string[];

  constructor(details: string[]) {
    super(
      HttpStatus.BAD_REQUEST,
      'Bad Request',
      'VALIDATION_ERROR',
      `Invalid job parameters: ${details.join('; ')}`,
    );
    this.details = details;
  }
}

/** No handler is registered for the requested job kind. */
export class UnsupportedJobKindException extends ApiException {
  constructor(kind: string) {
    super(
      HttpStatus.BAD_REQUEST,
      'Bad Request',
      'VALIDATION_ERROR',
      `Unsupported job kind "${kind}"`,
    );
  }
}

/**
 * Raised inside the runner when a handler outlives its deadline.
 * Never reaches an HTTP caller.
 */
export class JobTimeoutError extends Error {
  readonly code = 'JOB_TIMEOUT';

  constructor(timeoutMs: number) {
    super(`Job exceeded its ${timeoutMs} ms deadline`);
    this.name = 'JobTimeoutError';
  }
}

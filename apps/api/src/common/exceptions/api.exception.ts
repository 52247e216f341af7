import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Body shape shared by every exception the API throws on purpose.
 * `code` is stable and machine-readable; `message` is for humans.
 */
export interface ApiErrorBody {
  statusCode: number;
  error: string;
  code: string;
  message: string;
}

/**
 * Base for domain exceptions. Carries a stable `code` so the same error can be
 * rendered as an HTTP response or recorded on a failed job.
 */
export abstract class ApiException extends HttpException {
  readonly code: string;

  protected constructor(
    status: HttpStatus,
    error: string,
    code: string,
    message: string,
    cause?: Error,
  ) {
    const body: ApiErrorBody = { statusCode: status, error, code, message };
    super(body, status, cause ? { cause } : undefined);
    this.code = code;
  }
}

import { UnauthorizedException } from '@nestjs/common';

/**
 * Thrown when a bearer token cannot be verified.
 * HTTP 401 Unauthorized.
 */
export class InvalidTokenException extends UnauthorizedException {
  readonly code = 'UNAUTHORIZED';

  constructor(message = 'Invalid authentication token') {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      code: 'UNAUTHORIZED',
      message,
    });
  }
}

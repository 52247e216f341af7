import { HttpStatus } from '@nestjs/common';
import { ApiException } from '../common/exceptions/api.exception';

/**
 * Thrown when a real ID token arrives but no Firebase credentials are set.
 * Maps to HTTP 500: the server, not the client, is misconfigured.
 */
export class FirebaseNotConfiguredException extends ApiException {
  constructor(missing: string[]) {
    super(
      HttpStatus.INTERNAL_SERVER_ERROR,
      'Internal Server Error',
      'AUTH_NOT_CONFIGURED',
      `Firebase is not configured (missing ${missing.join(', ')})`,
    );
  }
}

import { HttpStatus } from '@nestjs/common';
import { ApiException } from '../../common/exceptions/api.exception';

/**
 * Auto-provisioning kept colliding with concurrent inserts (or the email
 * belongs to a different account). HTTP 500.
 */
export class UserProvisioningException extends ApiException {
  constructor(email: string) {
    super(
      HttpStatus.INTERNAL_SERVER_ERROR,
      'Internal Server Error',
      'PROVISIONING_FAILED',
      `Failed to auto-provision user ${email}`,
    );
  }
}

export class UserNotFoundException extends ApiException {
  constructor(userId: string) {
    super(
      HttpStatus.NOT_FOUND,
      'Not Found',
      'NOT_FOUND',
      `User "${userId}" not found`,
    );
  }
}

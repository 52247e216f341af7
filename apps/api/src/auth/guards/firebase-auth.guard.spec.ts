import { UnauthorizedException } from '@nestjs/common';
import { FirebaseAuthGuard, getFailureMessage } from './firebase-auth.guard';
import { InvalidTokenException } from '../exceptions/auth.exceptions';
import type { RequestUser } from '../interfaces/request-user.interface';

describe('FirebaseAuthGuard', () => {
  const guard = new FirebaseAuthGuard();
  const user: RequestUser = { userId: 'alice-uid', email: 'alice@example.com' };

  it('passes the verified user through', () => {
    expect(guard.handleRequest(null, user, undefined)).toBe(user);
  });

  it('rejects a request without a token', () => {
    expect(() => guard.handleRequest(null, false, 'Bearer realm="Users"')).toThrow(
      new UnauthorizedException('Authentication token is missing'),
    );
  });

  it('rethrows HTTP exceptions from the verifier unchanged', () => {
    const error = new InvalidTokenException('Authentication token has expired');

    expect(() => guard.handleRequest(error, false, undefined)).toThrow(error);
  });

  it('wraps any other verifier failure in a 401', () => {
    expect(() => guard.handleRequest(new Error('socket hang up'), false, undefined)).toThrow(
      UnauthorizedException,
    );
  });
});

describe('getFailureMessage', () => {
  it.each([
    ['Bearer realm="Users", error="invalid_token"', 'Invalid authentication token'],
    ['Bearer realm="Users"', 'Authentication token is missing'],
    [new Error('Token revoked'), 'Token revoked'],
    [undefined, 'Authentication token is missing'],
  ])('describes %p', (info, expected) => {
    expect(getFailureMessage(info)).toBe(expected);
  });
});

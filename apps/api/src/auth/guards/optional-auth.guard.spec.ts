import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { OptionalAuthGuard, extractBearerToken } from './optional-auth.guard';
import type { RequestUser } from '../interfaces/request-user.interface';
import { ALICE, FakeTokenVerifier } from '../../../test/support/fake-token-verifier';

interface FakeRequest {
  headers: { authorization?: string };
  user?: RequestUser | null;
}

describe('OptionalAuthGuard', () => {
  const guard = new OptionalAuthGuard(new FakeTokenVerifier());

  async function activate(authorization?: string): Promise<FakeRequest> {
    const request: FakeRequest = { headers: { authorization } };
    await expect(guard.canActivate(new ExecutionContextHost([request]))).resolves.toBe(true);
    return request;
  }

  it('attaches the user for a valid token', async () => {
    expect((await activate('Bearer token-alice')).user).toEqual(ALICE);
  });

  it('treats a missing token as anonymous', async () => {
    expect((await activate()).user).toBeNull();
  });

  it('treats an invalid token as anonymous', async () => {
    expect((await activate('Bearer forged')).user).toBeNull();
  });
});

describe('extractBearerToken', () => {
  it.each([
    ['Bearer abc', 'abc'],
    ['bearer   abc  ', 'abc'],
    ['Basic dXNlcjpwYXNz', null],
    ['Bearer', null],
    [undefined, null],
  ])('reads %p', (header, expected) => {
    expect(extractBearerToken(header)).toBe(expected);
  });
});

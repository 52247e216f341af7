import { TokenVerifier } from '../../src/auth/token-verifier';
import { InvalidTokenException } from '../../src/auth/exceptions/auth.exceptions';
import type { RequestUser } from '../../src/auth/interfaces/request-user.interface';

export const ALICE: RequestUser = { userId: 'alice-uid', email: 'alice@example.com', name: 'Alice Smith' };
export const BOB: RequestUser = { userId: 'bob-uid', email: 'bob@example.com', name: 'Bob' };

/** Accepts `token-alice` and `token-bob`; every other token is invalid. */
export class FakeTokenVerifier extends TokenVerifier {
  private readonly tokens = new Map<string, RequestUser>([
    ['token-alice', ALICE],
    ['token-bob', BOB],
  ]);

  async verify(token: string): Promise<RequestUser> {
    const user = this.tokens.get(token);
    if (!user) {
      throw new InvalidTokenException();
    }
    return { ...user };
  }
}

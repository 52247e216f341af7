import type { RequestUser } from './interfaces/request-user.interface';

/**
 * Turns a bearer token into an identity.
 *
 * Implementations throw InvalidTokenException for tokens that are
 * malformed, expired or revoked.
 */
export abstract class TokenVerifier {
  abstract verify(token: string): Promise<RequestUser>;
}

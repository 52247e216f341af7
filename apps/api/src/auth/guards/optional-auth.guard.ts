import { CanActivate, ExecutionContext, Injectable, Logger } from '@nestjs/common';
import { TokenVerifier } from '../token-verifier';
import type {
  OptionallyAuthenticatedRequest,
  RequestUser,
} from '../interfaces/request-user.interface';

const BEARER_PREFIX = /^Bearer\s+(.+)$/i;

/**
 * Lets every request through. request.user is the verified user when a
 * valid bearer token was sent, and null otherwise (no token, or a bad one).
 *
 * Pair with @OptionalUser() on the handler.
 */
@Injectable()
export class OptionalAuthGuard implements CanActivate {
  private readonly logger = new Logger(OptionalAuthGuard.name);

  constructor(private readonly tokenVerifier: TokenVerifier) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context
      .switchToHttp()
      .getRequest<OptionallyAuthenticatedRequest>();
    const token = extractBearerToken(request.headers.authorization);
    request.user = token ? await this.resolveUser(token) : null;
    return true;
  }

  private async resolveUser(token: string): Promise<RequestUser | null> {
    try {
      return await this.tokenVerifier.verify(token);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Ignoring unverifiable token on optional-auth route: ${message}`);
      return null;
    }
  }
}

export function extractBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const match = BEARER_PREFIX.exec(header.trim());
  return match ? match[1] : null;
}

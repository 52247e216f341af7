import {
  Injectable,
  UnauthorizedException,
  HttpException,
  Logger,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

/**
 * Firebase Authentication Guard - protects routes that require a signed-in user.
 *
 * Usage:
 * ```ts
 * @UseGuards(FirebaseAuthGuard)
 * @Get('me')
 * getProfile(@CurrentUser() user: RequestUser) { ... }
 * ```
 *
 * Overrides handleRequest to provide descriptive 401 messages instead of
 * Passport's default "Unauthorized".
 */
@Injectable()
export class FirebaseAuthGuard extends AuthGuard('firebase') {
  private readonly logger = new Logger(FirebaseAuthGuard.name);

  /**
   * Cases:
   * - No token provided → "Authentication token is missing"
   * - Verifier threw an HTTP exception → rethrown as is
   * - Anything else the verifier threw → 401 with its message
   */
  handleRequest<TUser>(
    err: Error | null,
    user: TUser | false,
    info: unknown,
  ): TUser {
    if (err) {
      if (err instanceof HttpException) {
        throw err;
      }
      this.logger.warn(`Auth error: ${err.message}`);
      throw new UnauthorizedException(err.message);
    }

    if (!user) {
      const message = getFailureMessage(info);
      this.logger.debug(`Auth rejected: ${message}`);
      throw new UnauthorizedException(message);
    }

    return user;
  }
}

/**
 * passport-http-bearer fails with a challenge string when the header is
 * absent and with an "invalid_token" challenge when it is malformed.
 */
export function getFailureMessage(info: unknown): string {
  if (typeof info === 'string' && info.includes('invalid_token')) {
    return 'Invalid authentication token';
  }
  if (info instanceof Error && info.message) {
    return info.message;
  }
  return 'Authentication token is missing';
}

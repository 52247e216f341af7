import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { getAuth } from 'firebase-admin/auth';
import type { DecodedIdToken } from 'firebase-admin/auth';
import { TokenVerifier } from '../auth/token-verifier';
import { InvalidTokenException } from '../auth/exceptions/auth.exceptions';
import type { RequestUser } from '../auth/interfaces/request-user.interface';
import { FirebaseAppProvider } from './firebase-app.provider';

export const DEV_TOKEN_PREFIX = 'dev_';

const FALLBACK_DEV_USER: RequestUser = {
  userId: 'dev_user_123',
  email: 'dev@example.com',
  name: 'Dev User',
};

/**
 * Verifies Firebase ID tokens with the Admin SDK.
 *
 * With AUTH_DEV_TOKENS=true, tokens shaped `dev_<uid>_<email>` are accepted
 * without contacting Firebase. Never enable that outside local development.
 */
@Injectable()
export class FirebaseTokenVerifier extends TokenVerifier {
  private readonly logger = new Logger(FirebaseTokenVerifier.name);
  private readonly devTokensEnabled: boolean;

  constructor(
    private readonly firebase: FirebaseAppProvider,
    configService: ConfigService,
  ) {
    super();
    this.devTokensEnabled =
      configService.get<string>('AUTH_DEV_TOKENS', 'false') === 'true';
    if (this.devTokensEnabled) {
      this.logger.warn('Development tokens are enabled (AUTH_DEV_TOKENS=true)');
    }
  }

  async verify(token: string): Promise<RequestUser> {
    if (this.devTokensEnabled && token.startsWith(DEV_TOKEN_PREFIX)) {
      return parseDevToken(token);
    }

    const app = await this.firebase.getApp();

    let decoded: DecodedIdToken;
    try {
      decoded = await getAuth(app).verifyIdToken(token);
    } catch (error) {
      const message = describeVerificationFailure(error);
      this.logger.debug(`ID token rejected: ${message}`);
      throw new InvalidTokenException(message);
    }

    return {
      userId: decoded.uid,
      email: decoded.email ?? '',
      role: stringClaim(decoded, 'role'),
      name: stringClaim(decoded, 'name'),
    };
  }
}

/**
 * `dev_<uid>_<email>`; the email keeps any further underscores.
 * Anything else after the prefix signs in as the fallback dev user.
 */
export function parseDevToken(token: string): RequestUser {
  const rest = token.slice(DEV_TOKEN_PREFIX.length);
  const separator = rest.indexOf('_');
  if (separator <= 0 || separator === rest.length - 1) {
    return { ...FALLBACK_DEV_USER };
  }
  return {
    userId: rest.slice(0, separator),
    email: rest.slice(separator + 1),
    name: 'Dev User',
  };
}

function stringClaim(token: DecodedIdToken, claim: string): string | undefined {
  const value: unknown = token[claim];
  return typeof value === 'string' ? value : undefined;
}

function describeVerificationFailure(error: unknown): string {
  const code =
    typeof error === 'object' && error !== null && 'code' in error
      ? error.code
      : undefined;

  switch (code) {
    case 'auth/id-token-expired':
      return 'Authentication token has expired';
    case 'auth/id-token-revoked':
      return 'Authentication token has been revoked';
    case 'auth/argument-error':
    case 'auth/invalid-id-token':
      return 'Invalid authentication token';
    default:
      return 'Authentication failed';
  }
}

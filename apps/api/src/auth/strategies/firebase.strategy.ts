import { Injectable } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { Strategy } from 'passport-http-bearer';
import { TokenVerifier } from '../token-verifier';
import type { RequestUser } from '../interfaces/request-user.interface';

/**
 * Bearer strategy backed by TokenVerifier.
 *
 * Flow:
 * 1. passport-http-bearer extracts the token from the Authorization header
 *    (a missing header fails the strategy before validate() runs)
 * 2. validate() hands the token to TokenVerifier
 * 3. The returned RequestUser is attached to request.user
 */
@Injectable()
export class FirebaseStrategy extends PassportStrategy(Strategy, 'firebase') {
  constructor(private readonly tokenVerifier: TokenVerifier) {
    super();
  }

  validate(token: string): Promise<RequestUser> {
    return this.tokenVerifier.verify(token);
  }
}

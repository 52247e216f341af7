import type { Request } from 'express';

/**
 * Shape of request.user after token verification.
 * Populated by FirebaseStrategy.validate() and attached by Passport.
 */
export interface RequestUser {
  userId: string;
  email: string;
  role?: string;
  name?: string;
}

/** Request on a route guarded by FirebaseAuthGuard. */
export interface AuthenticatedRequest extends Request {
  user: RequestUser;
}

/** Request on a route guarded by OptionalAuthGuard. */
export interface OptionallyAuthenticatedRequest extends Omit<Request, 'user'> {
  user: RequestUser | null;
}

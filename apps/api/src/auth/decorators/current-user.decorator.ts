import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { RequestUser } from '../interfaces/request-user.interface';

/**
 * Extracts the authenticated user from the request.
 *
 * Requires FirebaseAuthGuard - otherwise request.user is undefined.
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): RequestUser => {
    const request = ctx.switchToHttp().getRequest<{ user: RequestUser }>();
    return request.user;
  },
);

/**
 * Extracts the user, or null for anonymous callers.
 *
 * Requires OptionalAuthGuard.
 */
export const OptionalUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): RequestUser | null => {
    const request = ctx
      .switchToHttp()
      .getRequest<{ user?: RequestUser | null }>();
    return request.user ?? null;
  },
);

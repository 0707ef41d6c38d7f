import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { ActingUser, AuthedRequest } from '../auth/auth.guard';

/**
 * For routes guarded by AuthGuard: the signed-in user.
 */
export const CurrentUser = createParamDecorator((_data: unknown, ctx: ExecutionContext): ActingUser | undefined => {
  const req = ctx.switchToHttp().getRequest<AuthedRequest>();
  return req.user;
});

/**
 * For routes guarded by OptionalAuthGuard: the signed-in user or null.
 * Use when the endpoint works for both authenticated and anonymous users.
 */
export const OptionalCurrentUser = createParamDecorator((_data: unknown, ctx: ExecutionContext): ActingUser | null => {
  const req = ctx.switchToHttp().getRequest<AuthedRequest>();
  return req.user ?? null;
});

import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import type { Request } from 'express';
import { AuthenticationRequiredException } from '../../common/errors/authentication-required.exception';
import { getSessionCookie } from '../../common/session-cookie';
import { AuthService } from './auth.service';

/** The signed-in user a request acts as. */
export type ActingUser = { id: number; username: string };

export type AuthedRequest = Request & { user?: ActingUser };

/** Login-required routes. Runs before any handler, so anonymous writes never reach a service. */
@Injectable()
export class AuthGuard implements CanActivate {
  constructor(private readonly auth: AuthService) {}

  async canActivate(context: ExecutionContext) {
    const req = context.switchToHttp().getRequest<AuthedRequest>();
    const token = getSessionCookie(req);
    const user = await this.auth.actingUserFromSessionToken(token);
    if (!user) throw new AuthenticationRequiredException(req.originalUrl || req.url);
    req.user = user;
    return true;
  }
}

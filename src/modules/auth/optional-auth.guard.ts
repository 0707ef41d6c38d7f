import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { getSessionCookie } from '../../common/session-cookie';
import { AuthService } from './auth.service';
import type { AuthedRequest } from './auth.guard';

@Injectable()
export class OptionalAuthGuard implements CanActivate {
  constructor(private readonly auth: AuthService) {}

  async canActivate(context: ExecutionContext) {
    const req = context.switchToHttp().getRequest<AuthedRequest>();
    const token = getSessionCookie(req);
    req.user = (await this.auth.actingUserFromSessionToken(token)) ?? undefined;
    return true;
  }
}

import { UnauthorizedException } from '@nestjs/common';
import { loginPath } from '../paths';

/**
 * Thrown by AuthGuard for anonymous requests to write endpoints.
 * The exception filter turns `loginUrl` into a `Location` header and a `redirect` hint.
 */
export class AuthenticationRequiredException extends UnauthorizedException {
  readonly loginUrl: string;

  constructor(nextPath?: string | null) {
    super({ message: 'Authentication required.', error: 'authentication_required' });
    this.loginUrl = loginPath(nextPath);
  }
}

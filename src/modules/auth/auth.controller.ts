import { Body, Controller, Get, HttpCode, HttpStatus, Post, Req, Res } from '@nestjs/common';
import type { Request, Response } from 'express';
import { Throttle } from '@nestjs/throttler';
import { z } from 'zod';
import { setNoStore } from '../../common/http-cache';
import { getSessionCookie } from '../../common/session-cookie';
import { rateLimitLimit, rateLimitTtl } from '../../common/throttling/rate-limit.resolver';
import { profilePath } from '../../common/paths';
import { toAccountDto } from '../users/user.dto';
import { PASSWORD_MAX_LENGTH, PASSWORD_MIN_LENGTH } from './auth.constants';
import { optionalEmailSchema, personNameSchema, usernameSchema } from './auth.schemas';
import { AuthService } from './auth.service';

const registerSchema = z.object({
  username: usernameSchema,
  password: z.string().min(PASSWORD_MIN_LENGTH).max(PASSWORD_MAX_LENGTH),
  firstName: personNameSchema,
  lastName: personNameSchema,
  email: optionalEmailSchema,
});

const loginSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
});

@Controller('auth')
export class AuthController {
  constructor(private readonly auth: AuthService) {}

  @Throttle({
    default: {
      limit: rateLimitLimit('auth', 10),
      ttl: rateLimitTtl('auth', 60),
    },
  })
  @Post('register')
  async register(@Body() body: unknown, @Res({ passthrough: true }) res: Response) {
    const parsed = registerSchema.parse(body);
    const user = await this.auth.register(parsed, res);
    return { data: toAccountDto(user), redirect: profilePath(user.username) };
  }

  @Throttle({
    default: {
      limit: rateLimitLimit('auth', 10),
      ttl: rateLimitTtl('auth', 60),
    },
  })
  @HttpCode(HttpStatus.OK)
  @Post('login')
  async login(@Body() body: unknown, @Res({ passthrough: true }) res: Response) {
    const parsed = loginSchema.parse(body);
    const user = await this.auth.login(parsed, res);
    return { data: toAccountDto(user), redirect: profilePath(user.username) };
  }

  @HttpCode(HttpStatus.OK)
  @Post('logout')
  async logout(@Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const token = getSessionCookie(req);
    const result = await this.auth.logout(token, res);
    return { data: result };
  }

  @Get('me')
  async me(@Req() req: Request, @Res({ passthrough: true }) res: Response) {
    setNoStore(res);
    const user = await this.auth.userFromSessionToken(getSessionCookie(req));
    return { data: user ? toAccountDto(user) : null };
  }
}

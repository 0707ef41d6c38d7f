import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { AppConfigService } from '../app/app-config.service';
import type { User } from '../database/entities';
import { SessionsRepository, UsersRepository } from '../database/repositories';
import { AUTH_COOKIE_NAME } from './auth.constants';
import type { ActingUser } from './auth.guard';
import { hashPassword, hmacSha256Hex, randomSessionToken, verifyPassword } from './auth.utils';

export type RegisterInput = {
  username: string;
  password: string;
  firstName: string;
  lastName: string;
  email: string;
};

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly users: UsersRepository,
    private readonly sessions: SessionsRepository,
    private readonly appConfig: AppConfigService,
  ) {}

  async register(input: RegisterInput, res: Response): Promise<User> {
    const existing = await this.users.findByUsername(input.username);
    if (existing) throw new BadRequestException('A user with that username already exists.');

    const user = await this.users.create({
      username: input.username,
      passwordHash: await hashPassword(input.password),
      firstName: input.firstName,
      lastName: input.lastName,
      email: input.email,
    });
    this.logger.log(`registered user id=${user.id}`);

    await this.createSessionAndSetCookie(user.id, res);
    return user;
  }

  async login(params: { username: string; password: string }, res: Response): Promise<User> {
    const user = await this.users.findByUsername(params.username);
    const valid = user ? await verifyPassword(params.password, user.passwordHash) : false;
    if (!user || !valid) {
      throw new BadRequestException('Please enter a correct username and password.');
    }
    await this.createSessionAndSetCookie(user.id, res);
    return user;
  }

  async logout(token: string | undefined, res: Response) {
    if (token) {
      const tokenHash = hmacSha256Hex(this.appConfig.sessionHmacSecret(), token);
      await this.sessions.revokeByTokenHash(tokenHash, new Date());
    }
    this.clearAuthCookie(res);
    return { success: true };
  }

  async userFromSessionToken(token: string | undefined): Promise<User | null> {
    if (!token) return null;
    const tokenHash = hmacSha256Hex(this.appConfig.sessionHmacSecret(), token);
    const session = await this.sessions.findActiveByTokenHash(tokenHash, new Date());
    return session?.user ?? null;
  }

  async actingUserFromSessionToken(token: string | undefined): Promise<ActingUser | null> {
    const user = await this.userFromSessionToken(token);
    return user ? { id: user.id, username: user.username } : null;
  }

  private cookieOptions(expires: Date) {
    const isProd = this.appConfig.isProd();
    return {
      httpOnly: true,
      secure: isProd,
      sameSite: 'lax' as const,
      domain: isProd ? this.appConfig.cookieDomain() : undefined,
      path: '/',
      expires,
    };
  }

  private clearAuthCookie(res: Response) {
    const domain = this.appConfig.isProd() ? this.appConfig.cookieDomain() : undefined;
    res.clearCookie(AUTH_COOKIE_NAME, { path: '/', domain });
  }

  private async createSessionAndSetCookie(userId: number, res: Response) {
    const token = randomSessionToken();
    const tokenHash = hmacSha256Hex(this.appConfig.sessionHmacSecret(), token);
    const expiresAt = new Date(Date.now() + this.appConfig.sessionTtlDays() * 24 * 60 * 60_000);

    const session = await this.sessions.create({ userId, tokenHash, expiresAt });
    res.cookie(AUTH_COOKIE_NAME, token, this.cookieOptions(expiresAt));
    return session;
  }
}

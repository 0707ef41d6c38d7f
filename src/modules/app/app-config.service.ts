import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export type NodeEnv = 'development' | 'test' | 'production';

const DEV_SESSION_SECRET = 'dev-session-secret-change-me';

function isNodeEnv(value: string): value is NodeEnv {
  return value === 'development' || value === 'test' || value === 'production';
}

@Injectable()
export class AppConfigService {
  private readonly logger = new Logger(AppConfigService.name);

  constructor(private readonly config: ConfigService) {}

  private readBool(key: string, fallback: boolean): boolean {
    const raw = this.config.get<string>(key);
    if (raw == null) return fallback;
    const v = String(raw).trim().toLowerCase();
    if (!v) return fallback;
    if (['1', 'true', 'yes', 'on'].includes(v)) return true;
    if (['0', 'false', 'no', 'off'].includes(v)) return false;
    return fallback;
  }

  private readPositiveInt(key: string, fallback: number) {
    const raw = this.config.get<string>(key) ?? '';
    const n = Number(raw);
    return Number.isFinite(n) && n > 0 ? Math.floor(n) : fallback;
  }

  nodeEnv(): NodeEnv {
    const raw = (this.config.get<string>('NODE_ENV') ?? 'development').trim().toLowerCase();
    return isNodeEnv(raw) ? raw : 'development';
  }

  isProd(): boolean {
    return this.nodeEnv() === 'production';
  }

  port(): number {
    return this.readPositiveInt('PORT', 3001);
  }

  databaseUrl(): string {
    return (this.config.get<string>('DATABASE_URL') ?? '').trim();
  }

  databaseSynchronize(): boolean {
    return !this.isProd() && this.readBool('DATABASE_SYNCHRONIZE', false);
  }

  databaseLogging(): boolean {
    return this.readBool('DATABASE_LOGGING', false);
  }

  /** Queries slower than this are logged as warnings (default 500ms). */
  databaseSlowQueryMs(): number {
    return this.readPositiveInt('DATABASE_SLOW_QUERY_MS', 500);
  }

  /** Number of connection retries on startup (default 20). */
  databaseConnectRetries(): number {
    return this.readPositiveInt('DATABASE_CONNECT_RETRIES', 20);
  }

  /** Delay in ms between connection retries (default 500). */
  databaseConnectRetryDelayMs(): number {
    return this.readPositiveInt('DATABASE_CONNECT_RETRY_DELAY_MS', 500);
  }

  allowedOrigins(): string[] {
    const raw = this.config.get<string>('ALLOWED_ORIGINS') ?? '';
    return raw
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }

  isOriginAllowed(origin: string): boolean {
    return this.allowedOrigins().includes(origin);
  }

  logCorsBlocked(origin: string) {
    this.logger.warn(
      `CORS blocked origin: ${origin}. Allowed origins: ${this.allowedOrigins().join(', ') || '(none)'}`,
    );
  }

  sessionHmacSecret(): string {
    // env schema enforces a real secret in production
    return this.config.get<string>('SESSION_HMAC_SECRET')?.trim() || DEV_SESSION_SECRET;
  }

  usesDevSessionSecret(): boolean {
    return this.sessionHmacSecret() === DEV_SESSION_SECRET;
  }

  sessionTtlDays(): number {
    return this.readPositiveInt('SESSION_TTL_DAYS', 14);
  }

  cookieDomain(): string | undefined {
    const v = this.config.get<string>('COOKIE_DOMAIN');
    return v?.trim() ? v.trim() : undefined;
  }

  rateLimitTtlSeconds(): number {
    return this.readPositiveInt('RATE_LIMIT_TTL_SECONDS', 60);
  }

  rateLimitLimit(): number {
    // Pretty generous default.
    return this.readPositiveInt('RATE_LIMIT_LIMIT', 600);
  }

  rateLimitAuthTtlSeconds(): number {
    return this.readPositiveInt('RATE_LIMIT_AUTH_TTL_SECONDS', 60);
  }
  rateLimitAuthLimit(): number {
    return this.readPositiveInt('RATE_LIMIT_AUTH_LIMIT', 10);
  }

  rateLimitWriteTtlSeconds(): number {
    return this.readPositiveInt('RATE_LIMIT_WRITE_TTL_SECONDS', 60);
  }
  rateLimitWriteLimit(): number {
    return this.readPositiveInt('RATE_LIMIT_WRITE_LIMIT', 60);
  }

  trustProxy(): boolean {
    return this.readBool('TRUST_PROXY', false);
  }

  bodyJsonLimit(): string {
    return (this.config.get<string>('BODY_JSON_LIMIT') ?? '256kb').trim() || '256kb';
  }

  bodyUrlEncodedLimit(): string {
    return (this.config.get<string>('BODY_URLENCODED_LIMIT') ?? '256kb').trim() || '256kb';
  }

  requireCsrfOriginInProd(): boolean {
    return this.readBool('REQUIRE_CSRF_ORIGIN_IN_PROD', true);
  }

  logRequests(): boolean {
    return this.readBool('LOG_REQUESTS', false);
  }

  logStartupInfo(): boolean {
    return this.readBool('LOG_STARTUP_INFO', true);
  }
}

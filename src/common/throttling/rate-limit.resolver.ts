import type { ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';

/** Per-route limits published on `app.locals.blogRateLimits` at bootstrap. ttl is in seconds. */
export type RateLimitEntry = { limit: number; ttl: number };

export const RATE_LIMITS_LOCALS_KEY = 'blogRateLimits';

function getEntry(ctx: ExecutionContext, key: string): RateLimitEntry | null {
  const req = ctx.switchToHttp().getRequest<Request | undefined>();
  const locals: Record<string, unknown> | undefined = req?.app?.locals;
  const store = locals?.[RATE_LIMITS_LOCALS_KEY];
  if (typeof store !== 'object' || store === null) return null;
  const entry: unknown = Reflect.get(store, key);
  if (typeof entry !== 'object' || entry === null) return null;
  const limit: unknown = Reflect.get(entry, 'limit');
  const ttl: unknown = Reflect.get(entry, 'ttl');
  if (typeof limit !== 'number' || !Number.isFinite(limit) || limit <= 0) return null;
  if (typeof ttl !== 'number' || !Number.isFinite(ttl) || ttl <= 0) return null;
  return { limit, ttl };
}

export function rateLimitLimit(key: string, fallback: number) {
  return (ctx: ExecutionContext) => getEntry(ctx, key)?.limit ?? fallback;
}

/** Throttler ttl values are milliseconds. */
export function rateLimitTtl(key: string, fallbackSeconds: number) {
  return (ctx: ExecutionContext) => (getEntry(ctx, key)?.ttl ?? fallbackSeconds) * 1000;
}

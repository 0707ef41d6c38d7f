import type { NextFunction, Response } from 'express';
import type { RequestWithId } from './request-id.middleware';

const UNSAFE_METHODS = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

export type CsrfOriginOptions = {
  isOriginAllowed: (origin: string) => boolean;
  allowedOrigins: () => string[];
  /** Refuse unsafe requests that carry neither Origin nor Referer. */
  requireOrigin: boolean;
};

function refuse(req: RequestWithId, res: Response, reason: string) {
  return res.status(403).json({
    meta: {
      status: 403,
      ...(req.requestId ? { requestId: req.requestId } : {}),
      errors: [{ code: 403, message: 'CSRF blocked', reason }],
    },
  });
}

/**
 * Session cookies ride along on cross-site requests, so every write must come from
 * this API's own origin or an allowed web origin.
 */
export function csrfOriginCheck(opts: CsrfOriginOptions) {
  return (req: RequestWithId, res: Response, next: NextFunction) => {
    if (!UNSAFE_METHODS.has(req.method.toUpperCase())) return next();

    const origin = String(req.headers.origin ?? '').trim();
    const referer = String(req.headers.referer ?? '').trim();
    if (!origin && !referer) {
      return opts.requireOrigin ? refuse(req, res, 'csrf_missing_origin') : next();
    }

    const host = String(req.headers.host ?? '').trim();
    const selfOrigin = host ? `${req.protocol || 'http'}://${host}` : '';
    const allowed = origin
      ? opts.isOriginAllowed(origin) || (selfOrigin !== '' && origin === selfOrigin)
      : (selfOrigin !== '' && referer.startsWith(`${selfOrigin}/`)) ||
        opts.allowedOrigins().some((o) => referer.startsWith(`${o}/`));

    return allowed ? next() : refuse(req, res, 'csrf');
  };
}

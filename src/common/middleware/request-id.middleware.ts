import { randomUUID } from 'crypto';
import type { NextFunction, Request, Response } from 'express';

export type RequestWithId = Request & { requestId?: string };

/** Echoes the caller's `x-request-id`, or mints one; the error filter reports it. */
export function requestId() {
  return (req: RequestWithId, res: Response, next: NextFunction) => {
    const incoming = String(req.headers['x-request-id'] ?? '').trim();
    const id = incoming || randomUUID();
    res.setHeader('x-request-id', id);
    req.requestId = id;
    next();
  };
}

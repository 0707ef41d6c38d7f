import type { Response } from 'express';

/**
 * Feed and post reads: visibility is decided per request (publication date, category
 * state, deletions), so shared caches must revalidate every time.
 */
export function setReadCache(res: Response, opts: { viewerUserId: number | null }) {
  res.setHeader('Cache-Control', opts.viewerUserId ? 'private, no-cache' : 'no-cache');
  res.setHeader('Vary', 'Cookie');
}

export function setNoStore(res: Response) {
  res.setHeader('Cache-Control', 'no-store');
}

import type { NextFunction, Response } from 'express';
import { csrfOriginCheck } from './csrf-origin.middleware';
import type { RequestWithId } from './request-id.middleware';

function run(req: { method: string; headers: Record<string, string> }, requireOrigin = false) {
  const check = csrfOriginCheck({
    isOriginAllowed: (o) => o === 'http://localhost:3000',
    allowedOrigins: () => ['http://localhost:3000'],
    requireOrigin,
  });
  const res = { status: jest.fn(), json: jest.fn() };
  res.status.mockReturnValue(res);
  const next = jest.fn();
  check(
    { protocol: 'http', ...req } as unknown as RequestWithId,
    res as unknown as Response,
    next as unknown as NextFunction,
  );
  return { res, next };
}

describe('csrfOriginCheck', () => {
  it('lets safe methods through', () => {
    expect(run({ method: 'GET', headers: { origin: 'http://evil.test' } }).next).toHaveBeenCalled();
  });

  it('accepts allowed and same-origin writes', () => {
    expect(run({ method: 'POST', headers: { origin: 'http://localhost:3000' } }).next).toHaveBeenCalled();
    expect(
      run({ method: 'DELETE', headers: { origin: 'http://api.test', host: 'api.test' } }).next,
    ).toHaveBeenCalled();
    expect(
      run({ method: 'PATCH', headers: { referer: 'http://localhost:3000/posts/1' } }).next,
    ).toHaveBeenCalled();
  });

  it('blocks writes from other origins', () => {
    const { res, next } = run({ method: 'POST', headers: { origin: 'http://evil.test', host: 'api.test' } });
    expect(next).not.toHaveBeenCalled();
    expect(res.status).toHaveBeenCalledWith(403);
    expect(res.json).toHaveBeenCalledWith({
      meta: { status: 403, errors: [{ code: 403, message: 'CSRF blocked', reason: 'csrf' }] },
    });
  });

  it('blocks a lookalike referer prefix', () => {
    const { next } = run({ method: 'POST', headers: { referer: 'http://localhost:3000.evil.test/x' } });
    expect(next).not.toHaveBeenCalled();
  });

  it('requires an origin only when asked to', () => {
    expect(run({ method: 'POST', headers: {} }).next).toHaveBeenCalled();
    expect(run({ method: 'POST', headers: {} }, true).next).not.toHaveBeenCalled();
  });
});

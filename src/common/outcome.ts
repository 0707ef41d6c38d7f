import { HttpStatus } from '@nestjs/common';
import type { Response } from 'express';

/**
 * Result of a write that may be silently refused.
 *
 * `ok` carries the written value and where the client should go next.
 * `redirect` means nothing was written (e.g. the viewer does not own the resource);
 * it is not an error, the client is just sent back to the resource page.
 */
export type Outcome<T> =
  | { kind: 'ok'; value: T; location: string }
  | { kind: 'redirect'; location: string };

export function ok<T>(value: T, location: string): Outcome<T> {
  return { kind: 'ok', value, location };
}

export function redirectTo(location: string): Outcome<never> {
  return { kind: 'redirect', location };
}

export type OutcomeBody<D> = { data: D | null; redirect: string };

export function respondWithOutcome<T, D>(
  httpRes: Response,
  outcome: Outcome<T>,
  toDto: (value: T) => D,
): OutcomeBody<D> {
  if (outcome.kind === 'redirect') {
    httpRes.status(HttpStatus.SEE_OTHER);
    httpRes.location(outcome.location);
    return { data: null, redirect: outcome.location };
  }
  return { data: toDto(outcome.value), redirect: outcome.location };
}

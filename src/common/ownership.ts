import type { ActingUser } from '../modules/auth/auth.guard';

/** Only the author of a post or comment may change or delete it. */
export function canMutate(actor: ActingUser, resourceAuthorId: number): boolean {
  return actor.id === resourceAuthorId;
}

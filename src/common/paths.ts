// Client-facing locations used as success / redirect targets.

export const LOGIN_PATH = '/auth/login';

export function postDetailPath(postId: number): string {
  return `/posts/${postId}`;
}

export function profilePath(username: string): string {
  return `/profile/${encodeURIComponent(username)}`;
}

export function commentCreatePath(postId: number): string {
  return `${postDetailPath(postId)}/comments`;
}

export function loginPath(next?: string | null): string {
  const target = (next ?? '').trim();
  return target ? `${LOGIN_PATH}?next=${encodeURIComponent(target)}` : LOGIN_PATH;
}

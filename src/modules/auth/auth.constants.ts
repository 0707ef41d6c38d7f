export const AUTH_COOKIE_NAME = 'blog_session';

export const USERNAME_MAX_LENGTH = 150;
export const USERNAME_PATTERN = /^[\w.@+-]+$/;

export const PASSWORD_MIN_LENGTH = 8;
export const PASSWORD_MAX_LENGTH = 128;

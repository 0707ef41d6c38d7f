import type { User } from '../database/entities';

/** Public profile header shown above an author's posts. */
export type ProfileDto = {
  id: number;
  username: string;
  firstName: string;
  lastName: string;
  dateJoined: string;
};

/** What a user sees about themselves (auth/me, profile edit). */
export type AccountDto = ProfileDto & {
  email: string;
};

export function toProfileDto(user: User): ProfileDto {
  return {
    id: user.id,
    username: user.username,
    firstName: user.firstName,
    lastName: user.lastName,
    dateJoined: user.createdAt.toISOString(),
  };
}

export function toAccountDto(user: User): AccountDto {
  return {
    ...toProfileDto(user),
    email: user.email,
  };
}

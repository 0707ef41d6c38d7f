import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ok } from '../../common/outcome';
import type { Outcome } from '../../common/outcome';
import { profilePath } from '../../common/paths';
import type { ActingUser } from '../auth/auth.guard';
import type { User } from '../database/entities';
import { UsersRepository } from '../database/repositories';
import type { UserProfileData } from '../database/repositories';

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(private readonly users: UsersRepository) {}

  /**
   * Users may only edit their own profile. Someone else's username 404s,
   * the same as a username that doesn't exist.
   */
  async prepareProfileEdit(params: { actor: ActingUser; username: string }): Promise<User> {
    const { actor, username } = params;
    if (actor.username !== username) throw new NotFoundException('User not found.');

    const user = await this.users.findByUsername(username);
    if (!user || user.id !== actor.id) throw new NotFoundException('User not found.');
    return user;
  }

  async updateProfile(params: { actor: ActingUser; username: string; fields: UserProfileData }): Promise<Outcome<User>> {
    const { fields } = params;
    const user = await this.prepareProfileEdit(params);

    if (fields.username !== user.username) {
      const taken = await this.users.findByUsername(fields.username);
      if (taken && taken.id !== user.id) {
        throw new BadRequestException('A user with that username already exists.');
      }
    }

    const updated = await this.users.updateProfile(user.id, fields);
    this.logger.log(`profile updated user=${updated.id}`);
    return ok(updated, profilePath(updated.username));
  }
}

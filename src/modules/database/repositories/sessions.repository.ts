import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { IsNull, MoreThan, Repository } from 'typeorm';
import { Session } from '../entities';

export type SessionCreateData = { userId: number; tokenHash: string; expiresAt: Date };

export abstract class SessionsRepository {
  abstract create(data: SessionCreateData): Promise<Session>;
  /** Unrevoked, unexpired session for the token hash, with its user. */
  abstract findActiveByTokenHash(tokenHash: string, now: Date): Promise<Session | null>;
  abstract revokeByTokenHash(tokenHash: string, now: Date): Promise<void>;
}

@Injectable()
export class TypeOrmSessionsRepository extends SessionsRepository {
  constructor(@InjectRepository(Session) private readonly sessions: Repository<Session>) {
    super();
  }

  create(data: SessionCreateData): Promise<Session> {
    return this.sessions.save(this.sessions.create({ ...data, revokedAt: null }));
  }

  findActiveByTokenHash(tokenHash: string, now: Date): Promise<Session | null> {
    return this.sessions.findOne({
      where: { tokenHash, revokedAt: IsNull(), expiresAt: MoreThan(now) },
      relations: { user: true },
    });
  }

  async revokeByTokenHash(tokenHash: string, now: Date): Promise<void> {
    await this.sessions.update({ tokenHash, revokedAt: IsNull() }, { revokedAt: now });
  }
}

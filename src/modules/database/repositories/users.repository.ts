import { Injectable } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { User } from '../entities';

export type UserCreateData = {
  username: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  email: string;
};

export type UserProfileData = {
  username: string;
  firstName: string;
  lastName: string;
  email: string;
};

export abstract class UsersRepository {
  abstract findById(id: number): Promise<User | null>;
  abstract findByUsername(username: string): Promise<User | null>;
  abstract create(data: UserCreateData): Promise<User>;
  abstract updateProfile(id: number, data: UserProfileData): Promise<User>;
}

@Injectable()
export class TypeOrmUsersRepository extends UsersRepository {
  constructor(
    @InjectRepository(User) private readonly users: Repository<User>,
    @InjectDataSource() private readonly dataSource: DataSource,
  ) {
    super();
  }

  findById(id: number): Promise<User | null> {
    return this.users.findOne({ where: { id } });
  }

  findByUsername(username: string): Promise<User | null> {
    return this.users.findOne({ where: { username } });
  }

  create(data: UserCreateData): Promise<User> {
    return this.dataSource.transaction((manager) => manager.save(manager.create(User, data)));
  }

  updateProfile(id: number, data: UserProfileData): Promise<User> {
    return this.dataSource.transaction(async (manager) => {
      await manager.update(User, { id }, data);
      return manager.findOneOrFail(User, { where: { id } });
    });
  }
}

import { Global, Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import type { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { AppConfigService } from '../app/app-config.service';
import { BLOG_ENTITIES } from './entities';
import {
  CategoriesRepository,
  CommentsRepository,
  PostsRepository,
  SessionsRepository,
  TypeOrmCategoriesRepository,
  TypeOrmCommentsRepository,
  TypeOrmPostsRepository,
  TypeOrmSessionsRepository,
  TypeOrmUsersRepository,
  UsersRepository,
} from './repositories';
import { TypeOrmNestLogger } from './typeorm-logger';

/**
 * Owns the Postgres connection. Feature modules depend on the abstract repositories
 * only, so tests can swap in another global module that provides the same tokens.
 */
@Global()
@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [AppConfigService],
      useFactory: (cfg: AppConfigService): TypeOrmModuleOptions => ({
        type: 'postgres',
        url: cfg.databaseUrl(),
        entities: BLOG_ENTITIES,
        synchronize: cfg.databaseSynchronize(),
        logger: new TypeOrmNestLogger({ logQueries: cfg.databaseLogging() }),
        logging: cfg.databaseLogging() ? 'all' : ['error', 'warn', 'schema', 'migration'],
        maxQueryExecutionTime: cfg.databaseSlowQueryMs(),
        // Give Postgres a moment to come up (especially when using docker compose).
        retryAttempts: cfg.databaseConnectRetries(),
        retryDelay: cfg.databaseConnectRetryDelayMs(),
      }),
    }),
    TypeOrmModule.forFeature(BLOG_ENTITIES),
  ],
  providers: [
    { provide: PostsRepository, useClass: TypeOrmPostsRepository },
    { provide: CommentsRepository, useClass: TypeOrmCommentsRepository },
    { provide: CategoriesRepository, useClass: TypeOrmCategoriesRepository },
    { provide: UsersRepository, useClass: TypeOrmUsersRepository },
    { provide: SessionsRepository, useClass: TypeOrmSessionsRepository },
  ],
  exports: [PostsRepository, CommentsRepository, CategoriesRepository, UsersRepository, SessionsRepository],
})
export class DatabaseModule {}

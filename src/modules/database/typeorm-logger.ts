import { Logger as NestLogger } from '@nestjs/common';
import * as crypto from 'node:crypto';
import type { Logger as TypeOrmLogger } from 'typeorm';

/** Short, stable fingerprint so slow queries can be grouped without logging parameters (PII). */
export function queryFingerprint(query: string): { kind: string; fp: string } {
  const kind = query.trim().split(/\s+/, 1)[0]?.toUpperCase() || 'QUERY';
  const fp = crypto.createHash('sha1').update(query).digest('hex').slice(0, 10);
  return { kind, fp };
}

/** Routes TypeORM's logging through Nest's Logger. */
export class TypeOrmNestLogger implements TypeOrmLogger {
  private readonly logger = new NestLogger('Database');

  constructor(private readonly opts: { logQueries: boolean }) {}

  logQuery(query: string) {
    if (!this.opts.logQueries) return;
    this.logger.debug(query);
  }

  logQueryError(error: string | Error, query: string) {
    const { kind, fp } = queryFingerprint(query);
    const message = typeof error === 'string' ? error : error.message;
    this.logger.error(`query failed kind=${kind} query=${fp}: ${message}`);
  }

  logQuerySlow(time: number, query: string) {
    const { kind, fp } = queryFingerprint(query);
    this.logger.warn(`slow ${Math.floor(time)}ms kind=${kind} query=${fp}`);
  }

  logSchemaBuild(message: string) {
    this.logger.log(message);
  }

  logMigration(message: string) {
    this.logger.log(message);
  }

  log(level: 'log' | 'info' | 'warn', message: unknown) {
    if (level === 'warn') this.logger.warn(String(message));
    else this.logger.log(String(message));
  }
}

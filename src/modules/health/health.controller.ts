import { Controller, Get, Res } from '@nestjs/common';
import type { Response } from 'express';
import { DataSource } from 'typeorm';
import { setNoStore } from '../../common/http-cache';
import { AppConfigService } from '../app/app-config.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly dataSource: DataSource,
    private readonly appConfig: AppConfigService,
  ) {}

  @Get()
  async health(@Res({ passthrough: true }) httpRes: Response) {
    setNoStore(httpRes);
    const now = new Date();
    const uptimeSeconds = Math.max(0, Math.floor(process.uptime()));

    const config = {
      nodeEnv: this.appConfig.nodeEnv(),
      databaseSynchronize: this.appConfig.databaseSynchronize(),
      devSessionSecret: this.appConfig.usesDevSessionSecret(),
    };

    const startedAt = Date.now();
    try {
      // Readiness-style check: ensure the DB can execute a trivial query.
      await this.dataSource.query('SELECT 1');
      return {
        data: {
          status: 'ok',
          nowIso: now.toISOString(),
          uptimeSeconds,
          service: 'blog-api',
          config,
          db: { status: 'ok', latencyMs: Date.now() - startedAt },
        },
      };
    } catch (err) {
      return {
        data: {
          status: 'degraded',
          nowIso: now.toISOString(),
          uptimeSeconds,
          service: 'blog-api',
          config,
          db: {
            status: 'down',
            latencyMs: Date.now() - startedAt,
            error: err instanceof Error ? err.message : String(err),
          },
        },
      };
    }
  }
}

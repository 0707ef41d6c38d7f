import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import helmet from 'helmet';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import cookieParser = require('cookie-parser');
import compression = require('compression');
import * as express from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from '@nestjs/common';
import { AppModule } from './modules/app/app.module';
import { ApiResponseInterceptor } from './common/interceptors/api-response.interceptor';
import { ApiExceptionFilter } from './common/filters/api-exception.filter';
import { csrfOriginCheck } from './common/middleware/csrf-origin.middleware';
import { requestId } from './common/middleware/request-id.middleware';
import { AppConfigService } from './modules/app/app-config.service';
import { RATE_LIMITS_LOCALS_KEY } from './common/throttling/rate-limit.resolver';
import type { RateLimitEntry } from './common/throttling/rate-limit.resolver';

const logger = new Logger('Bootstrap');

function requestLogger() {
  const http = new Logger('HTTP');
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      const rid = String(res.getHeader('x-request-id') ?? '');
      http.log(`${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - start}ms) rid=${rid}`);
    });
    next();
  };
}

async function bootstrap() {
  const isProd = (process.env.NODE_ENV ?? '').trim().toLowerCase() === 'production';
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: isProd ? ['error', 'warn', 'log'] : ['error', 'warn', 'log', 'debug', 'verbose'],
  });
  const cfg = app.get(AppConfigService);

  const rateLimits: Record<string, RateLimitEntry> = {
    auth: { limit: cfg.rateLimitAuthLimit(), ttl: cfg.rateLimitAuthTtlSeconds() },
    write: { limit: cfg.rateLimitWriteLimit(), ttl: cfg.rateLimitWriteTtlSeconds() },
  };
  app.setLocal(RATE_LIMITS_LOCALS_KEY, rateLimits);
  // Feeds are revalidated on every read; ETags would only add conditional 304s.
  app.disable('etag');
  if (cfg.trustProxy()) app.set('trust proxy', 1);

  if (!cfg.isProd() && cfg.logStartupInfo()) {
    logger.log(
      `env=${cfg.nodeEnv()} port=${cfg.port()} origins=${cfg.allowedOrigins().join(',') || '(none)'} ` +
        `dbSynchronize=${cfg.databaseSynchronize()} writes=${rateLimits.write.limit}/${rateLimits.write.ttl}s ` +
        `auth=${rateLimits.auth.limit}/${rateLimits.auth.ttl}s`,
    );
  }
  if (cfg.usesDevSessionSecret()) {
    logger.warn('SESSION_HMAC_SECRET is not set; using the development default.');
  }

  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(compression());
  app.use(express.json({ limit: cfg.bodyJsonLimit() }));
  app.use(express.urlencoded({ extended: true, limit: cfg.bodyUrlEncodedLimit() }));
  app.use(cookieParser());
  app.use(requestId());
  if (!cfg.isProd() && cfg.logRequests()) app.use(requestLogger());
  app.use(
    csrfOriginCheck({
      isOriginAllowed: (origin) => cfg.isOriginAllowed(origin),
      allowedOrigins: () => cfg.allowedOrigins(),
      requireOrigin: cfg.isProd() && cfg.requireCsrfOriginInProd(),
    }),
  );

  app.useGlobalInterceptors(new ApiResponseInterceptor());
  app.useGlobalFilters(new ApiExceptionFilter());
  app.enableShutdownHooks();

  app.enableCors({
    credentials: true,
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      if (!origin || cfg.isOriginAllowed(origin)) return callback(null, true);
      cfg.logCorsBlocked(origin);
      return callback(null, false);
    },
  });

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Blog API')
      .setDescription('Posts, categories, comments and author profiles.')
      .setVersion('0.1.0')
      .build(),
  );
  SwaggerModule.setup('docs', app, document);

  const port = cfg.port();
  try {
    await app.listen(port);
    logger.log(`Listening on :${port}`);
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? String(err.code) : '';
    logger.error(code === 'EADDRINUSE' ? `Port ${port} is already in use.` : `Failed to start: ${String(err)}`);
    process.exit(1);
  }
}

void bootstrap();

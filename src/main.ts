import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import helmet from 'helmet';
import * as express from 'express';
import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Logger, type LogLevel } from '@nestjs/common';
import { AppModule } from './modules/app/app.module';
import { ApiResponseInterceptor } from './common/interceptors/api-response.interceptor';
import { ApiExceptionFilter, REQUEST_ID_HEADER } from './common/filters/api-exception.filter';
import { AppConfigService } from './modules/app/app-config.service';

async function bootstrap() {
  const startup = new Logger('Startup');
  const nodeEnv = (process.env.NODE_ENV ?? 'development').trim().toLowerCase();
  const isProd = nodeEnv === 'production';
  const logLevels: LogLevel[] = isProd ? ['error', 'warn', 'log'] : ['error', 'warn', 'log', 'debug', 'verbose'];
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { logger: logLevels });

  const appConfig = app.get(AppConfigService);

  startup.log(
    [
      `nodeEnv=${appConfig.nodeEnv()}`,
      `http=${appConfig.runHttp()}`,
      `jobConsumers=${appConfig.runJobConsumers()}`,
      `schedulers=${appConfig.runSchedulers()}`,
      `stream=${appConfig.stream() ? 'configured' : 'off'}`,
      `keywords=${appConfig.streamKeywords().length}`,
      `profiles=${appConfig.profileApi() ? 'configured' : 'off'}`,
    ].join(' | '),
  );

  app.disable('etag');

  // Security headers (API-safe defaults).
  app.use(
    helmet({
      crossOriginResourcePolicy: false,
      contentSecurityPolicy: false,
    }),
  );
  app.use(express.json({ limit: '1mb' }));

  // Admin responses are never cached.
  app.use((req: Request, res: Response, next: NextFunction) => {
    const path = String(req.originalUrl || req.url || '');
    if (path.startsWith('/admin/') || path === '/admin') {
      res.setHeader('Cache-Control', 'no-store');
    }
    next();
  });

  // Request id (for tracing + debugging). Echoed back as `x-request-id`; the error filter reads it from the response.
  app.use((req: Request, res: Response, next: NextFunction) => {
    const incoming = String(req.headers[REQUEST_ID_HEADER] ?? '').trim();
    res.setHeader(REQUEST_ID_HEADER, incoming || randomUUID());
    next();
  });

  app.useGlobalInterceptors(new ApiResponseInterceptor());
  app.useGlobalFilters(new ApiExceptionFilter());
  app.enableShutdownHooks();

  if (!appConfig.runHttp()) {
    startup.log('RUN_HTTP=false: HTTP server disabled (running background jobs only).');
    await app.init();
    return;
  }

  const port = appConfig.port();
  try {
    await app.listen(port);
    startup.log(`Listening on :${port}`);
  } catch (err) {
    const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : null;
    if (code === 'EADDRINUSE') {
      startup.error(`Port ${port} is already in use.`);
    } else {
      startup.error(`Failed to start server: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
  }
}

void bootstrap();

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import helmet from 'helmet';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import compression = require('compression');
import { randomUUID } from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Logger, type LogLevel } from '@nestjs/common';
import { AppModule } from './modules/app/app.module';
import { ApiExceptionFilter } from './common/filters/api-exception.filter';
import { AppConfigService } from './modules/app/app-config.service';
import { APP_VERSION } from './common/app-version';
import { errnoCode } from './common/storage/json-file';
import { errorMessage } from './common/errors/error-message';

async function bootstrap() {
  const logger = new Logger('HTTP');
  const startup = new Logger('Startup');
  const nodeEnv = (process.env.NODE_ENV ?? 'development').trim().toLowerCase();
  const isProd = nodeEnv === 'production';
  const levels: LogLevel[] = isProd ? ['error', 'warn', 'log'] : ['error', 'warn', 'log', 'debug', 'verbose'];
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { logger: levels });

  const appConfig = app.get(AppConfigService);

  // The client re-fetches once a day; a 304 would look like an empty body to it.
  app.disable('etag');

  if (appConfig.trustProxy()) {
    // Required for correct req.ip behind reverse proxies. Only enable with a trusted proxy in front.
    app.set('trust proxy', 1);
  }

  if (!isProd) {
    startup.log(
      [
        `nodeEnv=${appConfig.nodeEnv()}`,
        `port=${appConfig.port()}`,
        `trustProxy=${appConfig.trustProxy()}`,
        `token=${appConfig.appToken() ? 'set' : '(none)'}`,
        `dataDir=${appConfig.dataDir()}`,
        `throttle.global=${appConfig.rateLimitLimit()}/${appConfig.rateLimitTtlSeconds()}s`,
      ].join(' | '),
    );
  }

  // Security headers (API-safe defaults).
  app.use(
    helmet({
      crossOriginResourcePolicy: false,
      contentSecurityPolicy: false,
    }),
  );

  app.use(compression());

  // Request id (for tracing + debugging). Returned as `x-request-id`.
  app.use((req: Request, res: Response, next: NextFunction) => {
    const incoming = String(req.headers['x-request-id'] ?? '').trim();
    const id = incoming || randomUUID();
    req.headers['x-request-id'] = id;
    res.setHeader('x-request-id', id);
    next();
  });

  // Opt-in request logging (LOG_REQUESTS=true).
  if (appConfig.logRequests()) {
    app.use((req: Request, res: Response, next: NextFunction) => {
      const start = Date.now();
      const method = String(req.method || '');
      // Drop the query string: it may carry the access token.
      const path = String(req.originalUrl || req.url || '').split('?')[0];
      res.on('finish', () => {
        const ms = Date.now() - start;
        const rid = String(res.getHeader('x-request-id') ?? '');
        logger.log(`${method} ${path} -> ${res.statusCode} (${ms}ms)${rid ? ` rid=${rid}` : ''}`);
      });
      next();
    });
  }

  app.useGlobalFilters(new ApiExceptionFilter());
  app.enableShutdownHooks();

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Daily Drop API')
    .setDescription('One timezone-anchored daily item (IST) for a scheduled automation client.')
    .setVersion(APP_VERSION)
    .build();
  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('docs', app, document);

  const port = appConfig.port();
  try {
    await app.listen(port);
    startup.log(`Listening on :${port}`);
  } catch (err) {
    if (errnoCode(err) === 'EADDRINUSE') {
      startup.error(`Port ${port} is already in use (set PORT in .env).`);
    } else {
      startup.error(`Failed to start server: ${errorMessage(err)}`);
    }
    process.exit(1);
  }
}

void bootstrap();

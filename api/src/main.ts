// Sentry instrumentation MUST be imported first, before any other modules.
import './sentry/instrument';
import 'reflect-metadata';

import { NestFactory } from '@nestjs/core';
import type { LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { NestExpressApplication } from '@nestjs/platform-express';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { SentryExceptionFilter } from './sentry/sentry-exception.filter';

async function bootstrap() {
  const isDebug = process.env.DEBUG === 'true';
  const logLevels: LogLevel[] = isDebug
    ? ['error', 'warn', 'log', 'debug', 'verbose']
    : ['error', 'warn', 'log'];

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: logLevels,
  });

  // Security headers (X-Content-Type-Options, X-Frame-Options, HSTS, etc.)
  app.use(helmet());

  // Bot shutdown (gateway disconnect) runs in onModuleDestroy
  app.enableShutdownHooks();

  app.useGlobalFilters(new SentryExceptionFilter());

  const configService = app.get(ConfigService);
  await app.listen(configService.get<number>('PORT', 3000));
}
void bootstrap();

/**
 * Sentry instrumentation for the NestJS backend.
 * MUST be imported FIRST in main.ts, before any other imports.
 * Reporting is off unless SENTRY_DSN is set.
 */
import * as Sentry from '@sentry/nestjs';
import * as os from 'os';

const dsn = process.env.SENTRY_DSN;
const isProduction = process.env.NODE_ENV === 'production';

if (dsn) {
  Sentry.init({
    dsn,
    environment: isProduction ? 'production' : 'development',
    tracesSampleRate: isProduction ? 0.1 : 1.0,
    initialScope: {
      tags: {
        deployment: os.hostname(),
      },
    },
  });
}

import {
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { ExceptionFilter } from '@nestjs/common';
import * as Sentry from '@sentry/nestjs';
import type { Response } from 'express';

/**
 * Reports server errors to Sentry and answers HTTP requests with the
 * usual Nest error body.
 *
 * Registered with `app.useGlobalFilters(new ...)`, outside DI, so it does
 * not extend SentryGlobalFilter (that needs HttpAdapterHost injected).
 * Sentry calls are no-ops when instrument.ts skipped init.
 */
@Catch()
export class SentryExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(SentryExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    if (host.getType() !== 'http') {
      Sentry.captureException(exception);
      throw exception;
    }

    const response = host.switchToHttp().getResponse<Response>();
    if (response.headersSent) {
      return;
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body = exception.getResponse();

      // 4xx are caller mistakes, not ours
      if (status >= 500) {
        Sentry.captureException(exception);
      }

      response
        .status(status)
        .json(
          typeof body === 'string'
            ? { statusCode: status, message: body }
            : body,
        );
      return;
    }

    this.logger.error(
      'Unhandled error in HTTP handler:',
      exception instanceof Error ? exception.stack : exception,
    );
    Sentry.captureException(exception);
    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
    });
  }
}

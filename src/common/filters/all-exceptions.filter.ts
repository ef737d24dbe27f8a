import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorResponseDto } from '../dtos/error-response.dto';

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Catches every thrown exception (HTTP or otherwise) and converts it
 * into the ErrorResponseDto envelope so every error looks the same.
 * Headers already set on the response (Retry-After and friends) are kept.
 *
 * Registered globally in AppModule via APP_FILTER.
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body: ErrorResponseDto = {
      success: false,
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: 'INTERNAL_SERVER_ERROR',
      message: 'Internal server error',
      timestamp: new Date().toISOString(),
    };

    if (exception instanceof HttpException) {
      body.statusCode = exception.getStatus();
      const res = exception.getResponse();

      if (typeof res === 'object' && res !== null) {
        const r: Record<string, unknown> = { ...res };

        // ValidationPipe sends message as an array of per-field errors
        if (isStringArray(r.message)) {
          body.details = r.message;
          body.message = 'Validation failed';
        } else {
          body.message = String(r.message ?? exception.message);
        }
        if (isStringArray(r.issues)) {
          body.details = r.issues;
        }
        body.error = String(r.error ?? HttpStatus[body.statusCode] ?? 'HTTP_EXCEPTION');

        if (typeof r.outcome === 'string') {
          body.outcome = r.outcome;
          body.retryAfterMs =
            typeof r.retryAfterMs === 'number' ? r.retryAfterMs : null;
          body.matchedRuleId =
            typeof r.matchedRuleId === 'string' ? r.matchedRuleId : null;
        }
      } else {
        body.message = String(res);
        body.error = HttpStatus[body.statusCode] ?? 'HTTP_EXCEPTION';
      }
    } else if (exception instanceof Error) {
      // Log stack for unknown errors; never expose it to clients
      this.logger.error(
        `Unhandled exception on ${request.method} ${request.url}: ${exception.message}`,
        exception.stack,
      );
    } else {
      this.logger.error(
        `Unhandled non-error thrown on ${request.method} ${request.url}: ${String(exception)}`,
      );
    }

    if (response.headersSent) {
      return;
    }
    response.status(body.statusCode).json(body);
  }
}

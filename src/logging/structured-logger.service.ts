import { Injectable, LoggerService } from '@nestjs/common';
import * as winston from 'winston';
import { CorrelationContext } from './correlation-context';

type Meta = Record<string, unknown>;

function isMeta(value: unknown): value is Meta {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Splits Nest's variadic logger arguments into a context name, an optional
 * stack trace (errors only) and structured metadata.
 */
function splitParams(params: unknown[]): {
  context?: string;
  trace?: string;
  meta: Meta;
} {
  const rest = [...params];
  const meta = isMeta(rest[rest.length - 1]) ? rest.pop() : undefined;
  const strings = rest.filter(
    (param): param is string => typeof param === 'string',
  );
  const context = strings.length > 0 ? strings[strings.length - 1] : undefined;
  const trace = strings.length > 1 ? strings[0] : undefined;
  return { context, trace, meta: isMeta(meta) ? meta : {} };
}

function render(message: unknown): string {
  if (message instanceof Error) {
    return message.message;
  }
  return typeof message === 'string' ? message : JSON.stringify(message);
}

/**
 * A Nest logger implementation that emits one JSON object per line with a
 * consistent schema, including the current correlation id when a request is
 * being handled.
 *
 * Registered with `app.useLogger()`, so `new Logger(Class.name)` instances in
 * providers write through it.
 */
@Injectable()
export class StructuredLogger implements LoggerService {
  private readonly logger: winston.Logger;

  constructor() {
    this.logger = winston.createLogger({
      level: process.env.LOG_LEVEL || 'info',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.printf((info) => {
          const { timestamp, level, message, context, trace, ...meta } = info;
          return JSON.stringify({
            timestamp,
            level,
            message,
            correlationId: CorrelationContext.correlationId(),
            context,
            trace,
            ...meta,
          });
        }),
      ),
      transports: [new winston.transports.Console()],
    });
  }

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.write('info', message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    const { context, trace, meta } = splitParams(optionalParams);
    this.logger.error(render(message), {
      context,
      trace: trace ?? (message instanceof Error ? message.stack : undefined),
      ...meta,
    });
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.write('warn', message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.write('debug', message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.write('verbose', message, optionalParams);
  }

  private write(level: string, message: unknown, params: unknown[]): void {
    const { context, meta } = splitParams(params);
    this.logger.log(level, render(message), { context, ...meta });
  }
}

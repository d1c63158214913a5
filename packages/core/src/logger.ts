import pino, { type Logger, type LoggerOptions } from 'pino';

/**
 * Structured JSON logging for the analytics engine.
 *
 * Each domain module owns one logger from `createLogger`; an analysis run
 * logs through a child bound to its correlation ID.
 */

// Censored one level below the log object root, e.g. `{ config: { token } }`
const REDACT_PATHS = ['password', 'secret', 'token', 'apiKey', 'api_key', 'authorization'].map(
  (key) => `*.${key}`
);

export interface CreateLoggerOptions {
  /** Module name, e.g. `item-classification` */
  name: string;
}

/**
 * Create a module logger; the level comes from LOG_LEVEL (default `info`)
 */
export function createLogger({ name }: CreateLoggerOptions): Logger {
  const options: LoggerOptions = {
    name,
    level: process.env.LOG_LEVEL ?? 'info',
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: null,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  return pino(options);
}

/**
 * Child logger for one analysis run. `level`, when given, overrides the parent's.
 */
export function withCorrelationId(logger: Logger, correlationId: string, level?: string): Logger {
  return logger.child({ correlationId }, level ? { level } : {});
}

/**
 * Generate a correlation ID for one analysis run
 */
export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}

export type { Logger };

/**
 * Structured logging
 *
 * Pino loggers write JSON to stderr so stdout stays reserved for the
 * command plan.
 */

import pino, { type Logger } from 'pino';
import type { LogLevel } from '@/config/constants';

export type { Logger };

export interface LoggerOptions {
  name: string;
  level?: LogLevel;
}

export function createLogger(options: LoggerOptions): Logger {
  return pino(
    {
      name: options.name,
      level: options.level ?? 'warn',
      redact: {
        paths: ['clientSecret', '*.clientSecret', 'password', '*.password', 'accessToken'],
        censor: '[redacted]',
      },
    },
    pino.destination(2),
  );
}

/**
 * Timer for measuring an operation and logging its outcome.
 */
export interface Timer {
  end(fields?: Record<string, unknown>): number;
  error(error: unknown): number;
}

export function createTimer(logger: Logger, operation: string): Timer {
  const startTime = Date.now();
  return {
    end(fields = {}) {
      const durationMs = Date.now() - startTime;
      logger.debug({ ...fields, operation, durationMs }, 'Operation completed');
      return durationMs;
    },
    error(error) {
      const durationMs = Date.now() - startTime;
      logger.error({ error, operation, durationMs }, 'Operation failed');
      return durationMs;
    },
  };
}

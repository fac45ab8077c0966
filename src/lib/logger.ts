/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino. Logs go to stderr so that stdout stays reserved
 * for the audit report (text or JSON) that CI pipelines capture.
 */

import pino from 'pino';

export type { Logger } from 'pino';

export interface CreateLoggerOptions {
  /** Logger name, appears as `name` in every record */
  name?: string;
  /** Minimum level; falls back to LOG_LEVEL, then `info` */
  level?: string;
}

/**
 * Create a Pino logger writing JSON lines to stderr
 */
export function createLogger(options: CreateLoggerOptions = {}): pino.Logger {
  return pino(
    {
      name: options.name ?? 'compose-audit',
      level: options.level ?? process.env.LOG_LEVEL ?? 'info',
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
      serializers: {
        err: pino.stdSerializers.err,
        error: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

/**
 * Logger that discards everything, for library callers that pass none
 */
export function createSilentLogger(): pino.Logger {
  return pino({ level: 'silent' });
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => number;
}

/**
 * Create a timer that logs the duration of an operation when it ends
 */
export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): Timer {
  const startTime = Date.now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): number {
      const duration = Date.now() - startTime;
      logger.debug(
        { operation, duration_ms: duration, ...context, ...additionalContext },
        `Completed ${operation} in ${duration}ms`,
      );
      return duration;
    },
  };
}

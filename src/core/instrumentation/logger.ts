/**
 * @fileoverview Structured logging with Pino
 * @module core/instrumentation/logger
 */

/* eslint-disable import/no-named-as-default, import/no-named-as-default-member */

import pino, { type Logger } from 'pino';

import { isSchedulerError } from '../errors';

import type { LoggingConfig } from '../config/schema';

/**
 * Create base logger instance
 *
 * @param config - Logging configuration
 * @param serviceName - Value of the `service` binding on every line
 */
export function createLogger(config: LoggingConfig, serviceName: string): Logger {
  const pinoConfig: pino.LoggerOptions = {
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: serviceName,
      pid: process.pid,
    },
  };

  // Add pretty printing in development
  if (config.pretty) {
    return pino(
      pinoConfig,
      pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          singleLine: false,
          messageFormat: '[{service}] {msg}',
        },
      })
    );
  }

  return pino(pinoConfig);
}

/**
 * Create child logger bound to a component name
 */
export function forComponent(logger: Logger, component: string): Logger {
  return logger.child({ component });
}

/**
 * Log an error with its scheduler error code when it has one
 *
 * @param logger - Logger instance
 * @param error - Error to log
 * @param message - Log message; the error message when omitted
 * @param context - Additional context
 */
export function logError(
  logger: Logger,
  error: Error,
  message?: string,
  context?: Record<string, unknown>
): void {
  logger.error(
    {
      err: error,
      ...(isSchedulerError(error) ? { code: error.code } : {}),
      ...context,
    },
    message ?? error.message
  );
}

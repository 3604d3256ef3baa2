/**
 * @fileoverview Main logger factory for Tickline
 * Creates configured Winston logger instances with structured logging,
 * sensitive-field redaction, and flexible transport options.
 */

import winston from 'winston';
import type { LoggerConfig, Logger } from './types.js';
import { redactSensitive, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance with structured logging and redaction.
 *
 * Features:
 * - Structured logging with standard fields (timestamp, level, message)
 * - Automatic redaction of sensitive fields (passwords, tokens, etc.)
 * - Console, file and stream transports
 * - JSON or pretty-print output
 * - Child logger support for contextual logging
 *
 * @param config - Logger configuration options
 * @returns Configured Winston logger instance
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Pipeline started', { symbol: 'EURUSD' });
 * ```
 *
 * @example
 * ```typescript
 * // Component-scoped logging
 * const logger = createLogger({ level: 'debug', json: false });
 * const chainLogger = logger.child({ component: 'consolidator-chain' });
 * chainLogger.debug('Consolidator chain wired', { inputType: 'tick', outputType: 'tradebar' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stream,
  } = config;

  // Order matters: redact first, then standard fields, then output format
  const logFormat = winston.format.combine(
    redactSensitive(),
    standardFields,
    json ? winston.format.json() : prettyPrint
  );

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: logFormat,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (stream) {
    transports.push(
      new winston.transports.Stream({
        stream,
        level,
        format: logFormat,
      })
    );
  }

  // Winston warns when a logger has no transports; keep a silent sink instead.
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ level, silent: true }));
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    exitOnError: false,
  });
}

/**
 * Creates a child logger with additional context fields.
 * Child loggers inherit all configuration from the parent logger
 * and automatically include context fields in every log entry.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * const calendarLogger = createChildLogger(logger, { component: 'sessions-calendar', venue: 'forex' });
 * calendarLogger.info('Exchange created'); // includes component and venue
 * ```
 */
export function createChildLogger(
  logger: Logger,
  context: Record<string, unknown>
): Logger {
  return logger.child(context);
}

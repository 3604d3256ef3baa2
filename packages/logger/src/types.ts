/**
 * @fileoverview Type definitions for Tickline Logger
 * Provides strongly-typed interfaces for logger configuration and usage.
 */

import type { Writable } from 'node:stream';
import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Critical errors that require immediate attention
 * - 'warn': Warning conditions that should be reviewed
 * - 'info': Informational messages about normal operations
 * - 'debug': Detailed debugging information for development
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/tickline.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * - true: Machine-readable JSON (recommended for production)
   * - false: Human-readable pretty-print (recommended for development)
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Optional file path for file transport.
   * @example './logs/tickline.log'
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Optional writable stream receiving one formatted entry per line.
   * Useful for piping logs into another sink or capturing them in tests.
   */
  stream?: Writable;
}

/**
 * Structured log entry with standard fields.
 * Additional custom fields can be added via the index signature.
 */
export interface LogEntry {
  /** Log severity level */
  level: LogLevel;

  /** Human-readable log message */
  message: string;

  /** ISO 8601 timestamp */
  timestamp: string;

  /** Component or module name (typically from child logger) */
  component?: string;

  /** Instrument identifier (e.g., "EURUSD", "SPY") */
  symbol?: string;

  /** Trading venue profile (e.g., "forex", "equity") */
  venue?: string;

  /** Allow additional custom fields */
  [key: string]: unknown;
}

/**
 * Re-export Winston's Logger type for convenience.
 */
export type Logger = WinstonLogger;

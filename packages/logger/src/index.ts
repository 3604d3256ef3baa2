/**
 * @fileoverview Public API exports for @tickline/logger
 * Structured logging for the Tickline packages
 */

// Core logger creation
export { createLogger, createChildLogger } from './createLogger.js';

// Formats
export { redactSensitive, redactValue, standardFields, prettyPrint, REDACTED } from './formats.js';

// Environment configuration
export { loadLoggerConfig, loggerConfigSchema, loggerEnvMapping } from './config.js';
export type { LoggerEnvConfig } from './config.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel, LogEntry } from './types.js';

/**
 * @fileoverview Environment-driven logger configuration.
 */

import { z } from 'zod';
import { ConfigValidationError } from '@tickline/contracts';
import type { LoggerConfig } from './types.js';

/**
 * Logging section schema.
 */
export const loggerConfigSchema = z.object({
  level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  format: z.enum(['json', 'pretty']).default('json'),
  filePath: z.string().min(1).optional(),
});

export type LoggerEnvConfig = z.infer<typeof loggerConfigSchema>;

/**
 * Environment variable → schema field mapping.
 */
export const loggerEnvMapping: Record<string, keyof LoggerEnvConfig> = {
  LOG_LEVEL: 'level',
  LOG_FORMAT: 'format',
  LOG_FILE: 'filePath',
};

/**
 * Reads the logging section from environment variables and converts it into
 * `createLogger` options.
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws ConfigValidationError listing every invalid field
 *
 * @example
 * ```typescript
 * const logger = createLogger(loadLoggerConfig({ LOG_LEVEL: 'debug', LOG_FORMAT: 'pretty' }));
 * ```
 */
export function loadLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const raw: Record<string, string> = {};
  for (const [envKey, field] of Object.entries(loggerEnvMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      raw[field] = value.trim();
    }
  }

  const result = loggerConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigValidationError(`Logger configuration validation failed:\n${issues.join('\n')}`, {
      issues,
    });
  }

  return {
    level: result.data.level,
    json: result.data.format === 'json',
    filePath: result.data.filePath,
  };
}

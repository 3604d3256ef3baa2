/**
 * @fileoverview Environment-driven calendar configuration.
 */

import { z } from 'zod';
import { ConfigValidationError } from '@tickline/contracts';
import type { Logger } from '@tickline/logger';
import { createExchange } from './exchange.js';
import type { ExchangeOptions, SecurityExchange } from './exchange.js';
import { TIME_OF_DAY_PATTERN, parseTimeOfDay } from './instant.js';

const timeOfDaySchema = z
  .string()
  .regex(TIME_OF_DAY_PATTERN, 'Expected HH:mm or HH:mm:ss[.SSS]')
  .transform(parseTimeOfDay);

/**
 * Calendar section schema.
 */
export const calendarConfigSchema = z.object({
  venue: z.enum(['forex', 'equity']).default('forex'),
  nominalOpen: timeOfDaySchema.optional(),
  nominalClose: timeOfDaySchema.optional(),
});

export type CalendarConfig = z.infer<typeof calendarConfigSchema>;

/**
 * Environment variable → schema field mapping.
 */
export const calendarEnvMapping: Record<string, keyof CalendarConfig> = {
  TICKLINE_VENUE: 'venue',
  TICKLINE_NOMINAL_OPEN: 'nominalOpen',
  TICKLINE_NOMINAL_CLOSE: 'nominalClose',
};

/**
 * Reads the calendar section from environment variables.
 *
 * @param env - Environment to read (defaults to process.env)
 * @param logger - Receives the validation issues before the error is thrown
 * @throws ConfigValidationError listing every invalid field
 *
 * @example
 * ```typescript
 * const config = loadCalendarConfig({ TICKLINE_VENUE: 'equity' });
 * // { venue: 'equity' }
 * ```
 */
export function loadCalendarConfig(
  env: NodeJS.ProcessEnv = process.env,
  logger?: Logger
): CalendarConfig {
  const raw: Record<string, string> = {};
  for (const [envKey, field] of Object.entries(calendarEnvMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      raw[field] = value.trim();
    }
  }

  const result = calendarConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    logger?.error('Calendar configuration invalid', { component: 'sessions-calendar', issues });
    throw new ConfigValidationError(
      `Calendar configuration validation failed:\n${issues.join('\n')}`,
      { issues }
    );
  }

  return result.data;
}

/**
 * Builds the configured exchange.
 */
export function createExchangeFromConfig(
  config: CalendarConfig,
  options: Omit<ExchangeOptions, 'nominalOpen' | 'nominalClose'> = {}
): SecurityExchange {
  return createExchange(config.venue, {
    ...options,
    nominalOpen: config.nominalOpen,
    nominalClose: config.nominalClose,
  });
}

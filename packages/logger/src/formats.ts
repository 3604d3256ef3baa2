/**
 * @fileoverview Custom Winston formats for Tickline Logger
 * Includes sensitive-field redaction, standard fields and pretty-print output.
 */

import winston from 'winston';

const { format } = winston;

/**
 * Sensitive field patterns that should be redacted from logs.
 * Matches are case-insensitive to catch common variations.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /pwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /private[_-]?key/i,
];

/**
 * Replacement value for redacted sensitive data.
 */
export const REDACTED = '[REDACTED]';

/**
 * Core Winston fields that are never redacted.
 */
const CORE_FIELDS = ['level', 'message', 'timestamp', 'label'];

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with every sensitive key replaced by REDACTED,
 * descending into nested objects and arrays.
 *
 * @example
 * ```typescript
 * redactValue({ user: 'alice', password: 'test-secret' });
 * // { user: 'alice', password: '[REDACTED]' }
 * ```
 */
export function redactValue(value: unknown): unknown {
  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    redacted[key] = isSensitiveKey(key) ? REDACTED : redactValue(nested);
  }
  return redacted;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Applied first in the format chain so secrets never reach a transport.
 *
 * @example
 * ```typescript
 * logger.info('Feed connected', { host: 'localhost', token: 'test-token' });
 * // {"level":"info","message":"Feed connected","host":"localhost","token":"[REDACTED]"}
 * ```
 */
export const redactSensitive = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.includes(key)) {
      continue;
    }
    info[key] = isSensitiveKey(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * Winston format that adds the ISO timestamp and expands Error objects.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Winston format for human-readable pretty-print output.
 *
 * @example
 * ```typescript
 * // [2025-01-06T09:00:00.000+00:00] debug: Consolidator chain wired component=consolidator-chain inputType="tick"
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, symbol, venue, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (symbol) context.push(`symbol=${String(symbol)}`);
    if (venue) context.push(`venue=${String(venue)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (['stack', 'splat'].includes(key)) {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    if (info['stack']) {
      return `${baseMsg}\n${String(info['stack'])}`;
    }

    return baseMsg;
  })
);

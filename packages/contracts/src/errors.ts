/**
 * @fileoverview Error taxonomy for the Tickline market-data core.
 *
 * Every error carries a machine-readable code, an optional structured data
 * payload and the ISO timestamp at which it was raised, so callers can branch
 * on `code` instead of parsing messages.
 *
 * @module @tickline/contracts/errors
 */

import type { DataKind } from './market.js';

/**
 * Base error class for all Tickline errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new TicklineError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class TicklineError extends Error {
  /** Machine-readable error code (e.g., 'CONSOLIDATOR_TYPE_MISMATCH'). */
  readonly code: string;

  /** Structured context for debugging. Format varies by error type. */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created. */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'TicklineError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
  }

  /**
   * Serializes the error to a JSON-safe object.
   *
   * @example
   * ```typescript
   * JSON.stringify(new TicklineError('TEST', 'Test error'));
   * ```
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when two consolidators are chained whose declared type tags disagree.
 *
 * Raised once, at wiring time. No subscription exists when it is thrown.
 *
 * @example
 * ```typescript
 * throw new TypeMismatchError({ outputType: 'tradebar', inputType: 'tick' });
 * ```
 */
export class TypeMismatchError extends TicklineError {
  constructor(data: { outputType: DataKind; inputType: DataKind; [key: string]: unknown }) {
    super(
      'CONSOLIDATOR_TYPE_MISMATCH',
      `Cannot chain consolidators: first produces '${data.outputType}' but second consumes '${data.inputType}'`,
      data
    );
    this.name = 'TypeMismatchError';
  }
}

/**
 * Thrown when environment-derived configuration fails schema validation.
 *
 * @param data.issues - One `path: message` entry per failed field
 */
export class ConfigValidationError extends TicklineError {
  constructor(message: string, data: { issues: string[]; [key: string]: unknown }) {
    super('CONFIG_INVALID', message, data);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Type guard for any Tickline error.
 *
 * @example
 * ```typescript
 * try {
 *   new ConsolidatorChain(first, second);
 * } catch (err) {
 *   if (isTicklineError(err)) {
 *     console.error(`[${err.code}]`, err.message);
 *   }
 * }
 * ```
 */
export function isTicklineError(error: unknown): error is TicklineError {
  return error instanceof TicklineError;
}

export function isTypeMismatchError(error: unknown): error is TypeMismatchError {
  return error instanceof TypeMismatchError;
}

export function isConfigValidationError(error: unknown): error is ConfigValidationError {
  return error instanceof ConfigValidationError;
}

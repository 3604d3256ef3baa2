/**
 * @fileoverview Main entry point for @tickline/contracts package.
 *
 * Shared market data types and the error taxonomy used by every other
 * Tickline package.
 *
 * @module @tickline/contracts
 */

// Market data types
export type { Tick, TradeBar, MarketData, DataKind, DataOfKind } from './market.js';
export { isTick, isTradeBar } from './market.js';

// Error classes and guards
export {
  TicklineError,
  TypeMismatchError,
  ConfigValidationError,
  isTicklineError,
  isTypeMismatchError,
  isConfigValidationError,
} from './errors.js';

/**
 * Core type definitions for the consolidation pipeline.
 *
 * Market data records themselves live in @tickline/contracts; this module
 * adds the timeframe vocabulary used to size consolidated bars.
 */

/**
 * Canonical timeframe representation.
 *
 * - 1s, 5s, 15s, 30s: Sub-minute timeframes, typically built from ticks
 * - 1m, 5m, 10m, 15m, 30m: Intraday timeframes
 * - 1h, 2h, 4h: Intermediate timeframes
 * - 1D: Daily timeframe
 *
 * All timeframes are expressed in their most compact notation (e.g., "1m"
 * instead of "1min" or "60s").
 */
export type Timeframe =
  | '1s'
  | '5s'
  | '15s'
  | '30s'
  | '1m'
  | '5m'
  | '10m'
  | '15m'
  | '30m'
  | '1h'
  | '2h'
  | '4h'
  | '1D';

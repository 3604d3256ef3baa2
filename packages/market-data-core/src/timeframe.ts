/**
 * Timeframe manipulation utilities.
 *
 * This module provides functions for:
 * - Validating timeframe strings
 * - Converting timeframes to milliseconds
 * - Aligning timestamps to timeframe boundaries
 *
 * Timestamps are epoch milliseconds. No timezone conversion is performed:
 * a boundary is a multiple of the timeframe length since the epoch.
 */

import type { Timeframe } from './types.js';

/**
 * Canonical timeframes and their duration in milliseconds.
 *
 * All values are positive integers and divide one day evenly.
 */
const TIMEFRAME_MS: Record<Timeframe, number> = {
  '1s': 1_000,
  '5s': 5_000,
  '15s': 15_000,
  '30s': 30_000,
  '1m': 60_000,
  '5m': 300_000,
  '10m': 600_000,
  '15m': 900_000,
  '30m': 1_800_000,
  '1h': 3_600_000,
  '2h': 7_200_000,
  '4h': 14_400_000,
  '1D': 86_400_000,
};

/**
 * Returns true when `input` is a canonical timeframe.
 *
 * @example
 * ```typescript
 * isTimeframe("5m")   // true
 * isTimeframe("5min") // false
 * ```
 */
export function isTimeframe(input: string): input is Timeframe {
  return Object.prototype.hasOwnProperty.call(TIMEFRAME_MS, input);
}

/**
 * Converts a canonical timeframe to milliseconds.
 *
 * @example
 * ```typescript
 * toMillis("1s")  // 1000
 * toMillis("4h")  // 14400000
 * ```
 */
export function toMillis(timeframe: Timeframe): number {
  return TIMEFRAME_MS[timeframe];
}

/**
 * Aligns a timestamp to a timeframe boundary.
 *
 * @param timestamp - Unix epoch milliseconds
 * @param timeframe - Canonical timeframe
 * @param direction - "floor" (round down) or "ceil" (round up)
 *
 * @example
 * ```typescript
 * const ts = 1633024859000; // 14:40:59
 * alignTimestamp(ts, "5m", "floor"); // 1633024800000 (14:40:00)
 * alignTimestamp(ts, "5m", "ceil");  // 1633025100000 (14:45:00)
 * alignTimestamp(ts, "1s", "floor"); // 1633024859000 (already aligned)
 * ```
 *
 * Edge cases:
 * - An aligned timestamp is returned unchanged in both directions
 * - Negative timestamps are supported
 */
export function alignTimestamp(
  timestamp: number,
  timeframe: Timeframe,
  direction: 'floor' | 'ceil'
): number {
  const tfMs = toMillis(timeframe);
  return direction === 'floor'
    ? Math.floor(timestamp / tfMs) * tfMs
    : Math.ceil(timestamp / tfMs) * tfMs;
}

/**
 * Checks if a timestamp is aligned to a timeframe boundary.
 *
 * @example
 * ```typescript
 * isAligned(1633024800000, "5m"); // true  (14:40:00)
 * isAligned(1633024859000, "5m"); // false (14:40:59)
 * ```
 */
export function isAligned(timestamp: number, timeframe: Timeframe): boolean {
  return alignTimestamp(timestamp, timeframe, 'floor') === timestamp;
}

/**
 * Bar aggregation utilities.
 *
 * Aggregation follows standard financial conventions:
 * - Open = first sample's open
 * - High = max of all highs
 * - Low = min of all lows
 * - Close = last sample's close
 * - Volume = sum of all volumes
 *
 * The same merge rule backs both the batch `aggregateBars` and the streaming
 * consolidators, so a bar built incrementally equals the batch result.
 */

import type { TradeBar } from '@tickline/contracts';
import type { Logger } from '@tickline/logger';
import type { Timeframe } from './types.js';
import { toMillis, alignTimestamp } from './timeframe.js';

/**
 * Price and volume contribution of one input to a bar.
 */
export type OhlcvSample = Pick<TradeBar, 'open' | 'high' | 'low' | 'close' | 'volume'>;

/**
 * Options for aggregateBars function.
 */
export interface AggregateOptions {
  /**
   * If true, includes the last bar even when its inputs do not reach the end
   * of the target period (useful for live data).
   * @default false
   */
  includePartialLast?: boolean;

  /**
   * If true, validates that input bars are sorted with no duplicates.
   * @default false
   */
  validate?: boolean;

  /**
   * When set, a warning is logged for each gap between consecutive input
   * bars (next.timestamp > previous.endTime).
   */
  logger?: Logger;
}

/**
 * Starts a new bar on the `timeframe` boundary containing `timestamp`.
 *
 * @example
 * ```typescript
 * openBar('EURUSD', '1m', ts('09:00:42'), { open: 1.1, high: 1.1, low: 1.1, close: 1.1, volume: 10 });
 * // { kind: 'tradebar', timestamp: ts('09:00:00'), endTime: ts('09:01:00'), period: 60000, ... }
 * ```
 */
export function openBar(
  symbol: string,
  timeframe: Timeframe,
  timestamp: number,
  sample: OhlcvSample
): TradeBar {
  const period = toMillis(timeframe);
  const start = alignTimestamp(timestamp, timeframe, 'floor');
  return {
    kind: 'tradebar',
    symbol,
    timestamp: start,
    endTime: start + period,
    period,
    open: sample.open,
    high: sample.high,
    low: sample.low,
    close: sample.close,
    volume: sample.volume,
  };
}

/**
 * Folds one sample into an open bar. The bar is updated in place.
 */
export function mergeBar(bar: TradeBar, sample: OhlcvSample): TradeBar {
  bar.high = Math.max(bar.high, sample.high);
  bar.low = Math.min(bar.low, sample.low);
  bar.close = sample.close;
  bar.volume += sample.volume;
  return bar;
}

/**
 * Aggregates bars into a larger timeframe.
 *
 * Bars are grouped by aligned target boundaries (e.g., 5m bars start at :00,
 * :05, :10) and each group is merged into one bar.
 *
 * @param bars - Bars sorted by timestamp ascending
 * @param targetTimeframe - Output timeframe (must be >= the input bar period)
 * @param options - Aggregation options
 *
 * @throws Error if bars are unsorted (when validate=true)
 * @throws Error if the target timeframe is smaller than the input bar period
 *
 * @example
 * ```typescript
 * // Ten 1-minute bars from 14:00 to 14:09 become two 5-minute bars
 * const bars5m = aggregateBars(bars1m, "5m");
 * // [{ timestamp: ts("14:00"), ... }, { timestamp: ts("14:05"), ... }]
 * ```
 *
 * Edge cases:
 * - Empty input: Returns empty array
 * - Last group not reaching the period end: dropped unless includePartialLast
 * - Bars with zero volume: Included (volume sums to zero)
 */
export function aggregateBars(
  bars: TradeBar[],
  targetTimeframe: Timeframe,
  options: AggregateOptions = {}
): TradeBar[] {
  const { includePartialLast = false, validate = false, logger } = options;
  const targetMs = toMillis(targetTimeframe);

  const aggregated: TradeBar[] = [];
  let working: TradeBar | undefined;
  let lastEndTime: number | undefined;
  let previous: TradeBar | undefined;

  for (const [i, bar] of bars.entries()) {
    if (bar.period > targetMs) {
      throw new Error(
        `Cannot disaggregate from ${bar.period}ms to ${targetMs}ms. ` +
          `Target timeframe must be >= source timeframe.`
      );
    }

    if (validate && previous && bar.timestamp <= previous.timestamp) {
      throw new Error(
        `Bars must be sorted ascending by timestamp. ` +
          `Found bars[${i - 1}].timestamp=${previous.timestamp}, ` +
          `bars[${i}].timestamp=${bar.timestamp}`
      );
    }

    if (logger && previous && bar.timestamp > previous.endTime) {
      logger.warn('Gap detected in bar sequence', {
        symbol: bar.symbol,
        expected: previous.endTime,
        actual: bar.timestamp,
        gapMs: bar.timestamp - previous.endTime,
      });
    }

    if (working && bar.timestamp >= working.endTime) {
      aggregated.push(working);
      working = undefined;
    }

    if (working) {
      mergeBar(working, bar);
    } else {
      working = openBar(bar.symbol, targetTimeframe, bar.timestamp, bar);
    }

    lastEndTime = bar.endTime;
    previous = bar;
  }

  if (working && lastEndTime !== undefined) {
    const complete = lastEndTime >= working.endTime;
    if (complete || includePartialLast) {
      aggregated.push(working);
    }
  }

  return aggregated;
}

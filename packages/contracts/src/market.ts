/**
 * @fileoverview Market data types flowing through consolidators.
 *
 * Every record carries a `kind` tag. The tag is the nominal type identity a
 * consolidator declares for its input and output, so two stages can be
 * checked for compatibility without inspecting any data.
 *
 * @module @tickline/contracts/market
 */

/**
 * A single trade print.
 *
 * @invariant price > 0
 * @invariant quantity >= 0
 *
 * @example
 * ```typescript
 * const tick: Tick = {
 *   kind: 'tick',
 *   symbol: 'EURUSD',
 *   timestamp: Date.UTC(2025, 0, 6, 9, 0, 0),
 *   price: 1.0342,
 *   quantity: 100_000
 * };
 * ```
 */
export interface Tick {
  kind: 'tick';

  /** Instrument identifier (e.g., 'EURUSD', 'SPY') */
  symbol: string;

  /** Unix epoch milliseconds of the print */
  timestamp: number;

  /** Traded price */
  price: number;

  /** Traded size */
  quantity: number;
}

/**
 * An OHLCV bar covering `[timestamp, endTime)`.
 *
 * @invariant endTime === timestamp + period
 * @invariant high >= max(open, close) && low <= min(open, close)
 * @invariant volume >= 0
 */
export interface TradeBar {
  kind: 'tradebar';

  /** Instrument identifier */
  symbol: string;

  /** Bar start, Unix epoch milliseconds (inclusive) */
  timestamp: number;

  /** Bar end, Unix epoch milliseconds (exclusive) */
  endTime: number;

  /** Bar length in milliseconds */
  period: number;

  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Any record a consolidator can consume or produce.
 */
export type MarketData = Tick | TradeBar;

/**
 * Type tag identifying a market data shape ('tick' | 'tradebar').
 */
export type DataKind = MarketData['kind'];

/**
 * Narrows `MarketData` to the member carrying tag `K`.
 *
 * @example
 * ```typescript
 * type Bar = DataOfKind<'tradebar'>; // TradeBar
 * ```
 */
export type DataOfKind<K extends DataKind> = Extract<MarketData, { kind: K }>;

/**
 * Returns true when `data` is a trade bar.
 */
export function isTradeBar(data: MarketData): data is TradeBar {
  return data.kind === 'tradebar';
}

/**
 * Returns true when `data` is a tick.
 */
export function isTick(data: MarketData): data is Tick {
  return data.kind === 'tick';
}

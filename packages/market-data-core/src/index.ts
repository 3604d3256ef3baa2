/**
 * @tickline/market-data-core
 *
 * Timeframe math, bar aggregation and the composable consolidation pipeline.
 *
 * Key features:
 * - Timeframe normalization and alignment
 * - Batch bar aggregation (e.g., 1m → 5m)
 * - Streaming consolidators sharing one capability contract
 * - ConsolidatorChain: compose two consolidators into one, nest freely
 *
 * @example
 * ```typescript
 * import { ConsolidatorChain, TickConsolidator, TradeBarConsolidator } from "@tickline/market-data-core";
 *
 * const minuteBars = new ConsolidatorChain(
 *   new TickConsolidator("1s"),
 *   new TradeBarConsolidator("1m")
 * );
 * minuteBars.onConsolidated((bar) => console.log(bar));
 * minuteBars.update(tick);
 * ```
 *
 * @packageDocumentation
 */

// Types
export type { Timeframe } from "./types.js";

// Timeframe utilities
export {
  toMillis,
  isTimeframe,
  alignTimestamp,
  isAligned,
} from "./timeframe.js";

// Aggregation utilities
export { aggregateBars, openBar, mergeBar } from "./aggregate.js";
export type { AggregateOptions, OhlcvSample } from "./aggregate.js";

// Consolidation pipeline
export type { DataConsolidator } from "./consolidators/types.js";
export { ConsolidatedChannel } from "./consolidators/events.js";
export type { ConsolidatedHandler, Unsubscribe } from "./consolidators/events.js";
export {
  PeriodConsolidator,
  TickConsolidator,
  TradeBarConsolidator,
} from "./consolidators/period-consolidator.js";
export type { PeriodConsolidatorOptions } from "./consolidators/period-consolidator.js";
export { IdentityConsolidator } from "./consolidators/identity-consolidator.js";
export { ConsolidatorChain } from "./consolidators/consolidator-chain.js";
export type { ConsolidatorChainOptions } from "./consolidators/consolidator-chain.js";

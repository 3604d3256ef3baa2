/**
 * Fixed-period bar consolidators.
 *
 * A period consolidator keeps one working bar aligned to its timeframe. The
 * bar closes when data at or past its end arrives (or when `scan` is told
 * the clock has passed its end). The data that closed it opens the next
 * working bar, then the closed bar becomes `consolidated` and is emitted.
 * Each period is emitted at most once.
 */

import type { DataKind, MarketData, Tick, TradeBar } from '@tickline/contracts';
import type { Logger } from '@tickline/logger';
import type { Timeframe } from '../types.js';
import { toMillis } from '../timeframe.js';
import { openBar, mergeBar } from '../aggregate.js';
import type { OhlcvSample } from '../aggregate.js';
import { ConsolidatedChannel } from './events.js';
import type { ConsolidatedHandler, Unsubscribe } from './events.js';
import type { DataConsolidator } from './types.js';

export interface PeriodConsolidatorOptions {
  /** Receives debug entries for dropped out-of-order data */
  logger?: Logger;
}

/**
 * Base class for consolidators producing `TradeBar`s of a fixed timeframe.
 *
 * Subclasses declare their input tag and map one input record to its
 * OHLCV contribution.
 */
export abstract class PeriodConsolidator<TIn extends MarketData>
  implements DataConsolidator<TIn, TradeBar>
{
  abstract readonly inputType: DataKind;
  readonly outputType: DataKind = 'tradebar';
  readonly timeframe: Timeframe;

  private readonly channel = new ConsolidatedChannel<TradeBar>();
  private readonly logger: Logger | undefined;
  private working: TradeBar | undefined;
  private last: TradeBar | undefined;

  constructor(timeframe: Timeframe, options: PeriodConsolidatorOptions = {}) {
    this.timeframe = timeframe;
    this.logger = options.logger?.child({ component: 'period-consolidator', timeframe });
  }

  get consolidated(): TradeBar | undefined {
    return this.last;
  }

  /** The bar currently being built, or undefined between bars */
  get workingBar(): TradeBar | undefined {
    return this.working;
  }

  /**
   * Folds `data` into the working bar.
   *
   * Data before the working bar's start, or before the end of the last
   * emitted bar when no bar is open, is dropped. When `data` reaches the
   * working bar's end, the next bar is opened with `data` first and the
   * closed bar is emitted after.
   */
  update(data: TIn): void {
    const earliest = this.working?.timestamp ?? this.last?.endTime;
    if (earliest !== undefined && data.timestamp < earliest) {
      this.logger?.debug('Dropping out-of-order data', {
        symbol: data.symbol,
        dataTimestamp: data.timestamp,
        earliestTimestamp: earliest,
      });
      return;
    }

    const sample = this.toSample(data);
    const current = this.working;
    if (current && data.timestamp < current.endTime) {
      mergeBar(current, sample);
      return;
    }

    this.working = openBar(data.symbol, this.timeframe, data.timestamp, sample);
    if (current) {
      this.publish(current);
    }
  }

  /**
   * Closes the working bar if `currentTime` has reached its end.
   *
   * Lets a clock close a bar during quiet periods instead of waiting for the
   * next record.
   *
   * @param currentTime - Unix epoch milliseconds
   */
  scan(currentTime: number): void {
    const current = this.working;
    if (current && currentTime >= current.endTime) {
      this.working = undefined;
      this.publish(current);
    }
  }

  onConsolidated(handler: ConsolidatedHandler<TradeBar>): Unsubscribe {
    return this.channel.on(handler);
  }

  protected abstract toSample(data: TIn): OhlcvSample;

  private publish(bar: TradeBar): void {
    this.last = bar;
    this.channel.emit(bar);
  }
}

/**
 * Builds bars from trade ticks: OHLC from prices, volume from quantities.
 *
 * @example
 * ```typescript
 * const seconds = new TickConsolidator('1s');
 * seconds.onConsolidated((bar) => console.log(bar.timestamp, bar.close));
 * ```
 */
export class TickConsolidator extends PeriodConsolidator<Tick> {
  readonly inputType: DataKind = 'tick';

  protected toSample(tick: Tick): OhlcvSample {
    return {
      open: tick.price,
      high: tick.price,
      low: tick.price,
      close: tick.price,
      volume: tick.quantity,
    };
  }
}

/**
 * Builds larger bars from smaller ones (e.g., 1s → 1m, 1m → 1h).
 *
 * @throws Error from `update` when an input bar is longer than the timeframe
 */
export class TradeBarConsolidator extends PeriodConsolidator<TradeBar> {
  readonly inputType: DataKind = 'tradebar';

  protected toSample(bar: TradeBar): OhlcvSample {
    const targetMs = toMillis(this.timeframe);
    if (bar.period > targetMs) {
      throw new Error(
        `Cannot consolidate ${bar.period}ms bars into ${targetMs}ms bars. ` +
          `Target timeframe must be >= source timeframe.`
      );
    }
    return bar;
  }
}

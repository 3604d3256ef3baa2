/**
 * Capability contract shared by every consolidator.
 *
 * A consolidator is an opaque stage: it declares the type tag it consumes and
 * the one it produces, takes input through `update`, remembers the last value
 * it produced and announces each new value on its channel. How it buffers is
 * its own business.
 */

import type { DataKind, MarketData } from '@tickline/contracts';
import type { ConsolidatedHandler, Unsubscribe } from './events.js';

/**
 * A stream transformation stage from `TIn` records to `TOut` records.
 *
 * @invariant `consolidated` is undefined until the first value is produced
 * @invariant every produced value is emitted exactly once, synchronously, from
 *            inside the `update` (or `scan`) call that produced it
 *
 * @example
 * ```typescript
 * const seconds: DataConsolidator<Tick, TradeBar> = new TickConsolidator('1s');
 * seconds.onConsolidated((bar) => console.log(bar.close));
 * seconds.update(tick);
 * ```
 */
export interface DataConsolidator<
  TIn extends MarketData = MarketData,
  TOut extends MarketData = MarketData,
> {
  /** Type tag of the records accepted by `update` */
  readonly inputType: DataKind;

  /** Type tag of the records this stage produces */
  readonly outputType: DataKind;

  /** Most recently produced value, or undefined before the first one */
  readonly consolidated: TOut | undefined;

  /** Feed one record into the stage */
  update(data: TIn): void;

  /** Subscribe to produced values */
  onConsolidated(handler: ConsolidatedHandler<TOut>): Unsubscribe;
}

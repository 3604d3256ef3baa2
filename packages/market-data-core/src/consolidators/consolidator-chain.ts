/**
 * Composition of two consolidators into one.
 *
 * Data enters `first`; whatever `first` produces is fed to `second`; whatever
 * `second` produces is republished as the chain's own output. A chain is
 * itself a `DataConsolidator`, so longer pipelines are built by nesting:
 * `new ConsolidatorChain(a, new ConsolidatorChain(b, c))`.
 */

import { TypeMismatchError } from '@tickline/contracts';
import type { DataKind, MarketData } from '@tickline/contracts';
import type { Logger } from '@tickline/logger';
import { ConsolidatedChannel } from './events.js';
import type { ConsolidatedHandler, Unsubscribe } from './events.js';
import type { DataConsolidator } from './types.js';

export interface ConsolidatorChainOptions {
  /** Receives a debug entry once the chain is wired */
  logger?: Logger;
}

/**
 * Chains `first` into `second`.
 *
 * The chain neither creates nor owns its stages, but it holds exactly one
 * subscription on `first` (forwarding into `second.update`) and one on
 * `second` (republishing) until `dispose` is called.
 *
 * Compatibility is checked once, at construction, by comparing
 * `first.outputType` with `second.inputType`. Nothing is validated per record.
 *
 * @example
 * ```typescript
 * const minutes = new ConsolidatorChain(
 *   new TickConsolidator('1s'),
 *   new TradeBarConsolidator('1m')
 * );
 * minutes.onConsolidated((bar) => console.log('1m bar', bar));
 * for (const tick of ticks) minutes.update(tick);
 * ```
 */
export class ConsolidatorChain<
  TIn extends MarketData = MarketData,
  TMid extends MarketData = MarketData,
  TOut extends MarketData = MarketData,
> implements DataConsolidator<TIn, TOut>
{
  readonly first: DataConsolidator<TIn, TMid>;
  readonly second: DataConsolidator<TMid, TOut>;

  private readonly channel = new ConsolidatedChannel<TOut>();
  private subscriptions: Unsubscribe[];

  /**
   * @throws TypeMismatchError when `first.outputType !== second.inputType`;
   *         no subscription is made in that case
   */
  constructor(
    first: DataConsolidator<TIn, TMid>,
    second: DataConsolidator<TMid, TOut>,
    options: ConsolidatorChainOptions = {}
  ) {
    if (first.outputType !== second.inputType) {
      throw new TypeMismatchError({ outputType: first.outputType, inputType: second.inputType });
    }

    this.first = first;
    this.second = second;
    this.subscriptions = [
      first.onConsolidated((value) => second.update(value)),
      second.onConsolidated((value) => this.channel.emit(value)),
    ];

    options.logger?.debug('Consolidator chain wired', {
      component: 'consolidator-chain',
      inputType: first.inputType,
      intermediateType: first.outputType,
      outputType: second.outputType,
    });
  }

  get inputType(): DataKind {
    return this.first.inputType;
  }

  get outputType(): DataKind {
    return this.second.outputType;
  }

  /** Always read from `second`; the chain keeps no copy */
  get consolidated(): TOut | undefined {
    return this.second.consolidated;
  }

  /**
   * Feeds `data` to `first`. Errors raised by either stage, or by a
   * subscriber of the chain, reach the caller unchanged.
   */
  update(data: TIn): void {
    this.first.update(data);
  }

  onConsolidated(handler: ConsolidatedHandler<TOut>): Unsubscribe {
    return this.channel.on(handler);
  }

  /**
   * Removes both wiring subscriptions. The stages are left intact and can be
   * rewired elsewhere. Calling it again is a no-op.
   */
  dispose(): void {
    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    this.subscriptions = [];
  }
}

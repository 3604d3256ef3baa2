/**
 * Pass-through stage: every input is produced unchanged.
 *
 * Useful as a tap point (subscribe to raw data through the same contract as
 * consolidated data) and as a neutral element when assembling chains.
 */

import type { DataKind, MarketData } from '@tickline/contracts';
import { ConsolidatedChannel } from './events.js';
import type { ConsolidatedHandler, Unsubscribe } from './events.js';
import type { DataConsolidator } from './types.js';

export class IdentityConsolidator<T extends MarketData> implements DataConsolidator<T, T> {
  readonly inputType: DataKind;
  readonly outputType: DataKind;

  private readonly channel = new ConsolidatedChannel<T>();
  private last: T | undefined;

  constructor(kind: T['kind']) {
    this.inputType = kind;
    this.outputType = kind;
  }

  get consolidated(): T | undefined {
    return this.last;
  }

  update(data: T): void {
    this.last = data;
    this.channel.emit(data);
  }

  onConsolidated(handler: ConsolidatedHandler<T>): Unsubscribe {
    return this.channel.on(handler);
  }
}

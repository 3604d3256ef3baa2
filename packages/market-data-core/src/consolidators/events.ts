/**
 * Notification channel for consolidated output.
 *
 * Each consolidator owns one channel and emits on it every time it produces
 * a value. Delivery is synchronous and in subscription order, so ingesting
 * into the head of a chain drives every downstream stage before `update`
 * returns.
 *
 * Listener errors are NOT caught: they propagate to whoever called `emit`,
 * which is ultimately the caller of the consolidator's `update`.
 *
 * Thread-safety: This implementation is NOT thread-safe. Callers feeding a
 * consolidator from several producers must serialize access externally.
 */

/**
 * Callback invoked with each newly consolidated value.
 */
export type ConsolidatedHandler<T> = (consolidated: T) => void;

/**
 * Removes a subscription. Calling it more than once is a no-op.
 */
export type Unsubscribe = () => void;

/**
 * Single-event pub-sub channel.
 *
 * Example:
 * ```typescript
 * const channel = new ConsolidatedChannel<TradeBar>();
 *
 * const unsubscribe = channel.on((bar) => {
 *   console.log(`${bar.symbol} closed at ${bar.close}`);
 * });
 *
 * channel.emit(bar);
 * unsubscribe();
 * ```
 */
export class ConsolidatedChannel<T> {
  private listeners: ConsolidatedHandler<T>[] = [];

  /**
   * Subscribe to consolidated values.
   *
   * @returns Unsubscribe function
   */
  on(listener: ConsolidatedHandler<T>): Unsubscribe {
    this.listeners.push(listener);
    return () => {
      this.off(listener);
    };
  }

  /**
   * Remove one registration of `listener`, if present.
   */
  off(listener: ConsolidatedHandler<T>): void {
    const index = this.listeners.indexOf(listener);
    if (index !== -1) {
      this.listeners.splice(index, 1);
    }
  }

  /**
   * Deliver `value` to every current listener.
   *
   * The listener list is snapshotted first: subscriptions added or removed
   * by a listener take effect from the next emit.
   */
  emit(value: T): void {
    for (const listener of [...this.listeners]) {
      listener(value);
    }
  }

  /**
   * Number of active listeners.
   */
  listenerCount(): number {
    return this.listeners.length;
  }

  /**
   * Remove every listener.
   */
  removeAllListeners(): void {
    this.listeners = [];
  }
}

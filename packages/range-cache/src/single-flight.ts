/**
 * Per-key request coalescing.
 */

/**
 * Concurrent calls for the same key share the first caller's promise until it
 * settles. When disabled every call runs on its own.
 *
 * @example
 * ```typescript
 * const flights = new SingleFlight<PriceRangeResponse>();
 * const response = await flights.run(cacheKey, () => loadPrices(ticker));
 * ```
 */
export class SingleFlight<T> {
  private readonly inflight = new Map<string, Promise<T>>();

  constructor(private readonly enabled: boolean = true) {}

  run(key: string, fn: () => Promise<T>): Promise<T> {
    if (!this.enabled) {
      return fn();
    }

    const existing = this.inflight.get(key);
    if (existing) {
      return existing;
    }

    const promise = fn().finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, promise);
    return promise;
  }

  /** Number of keys with a call in flight */
  size(): number {
    return this.inflight.size;
  }
}

/**
 * IN-FLIGHT REGISTRY
 * ==================
 *
 * Single-flight for cache misses: the first caller for a key runs the
 * fetch, concurrent callers for the same key await the same promise.
 */

export class InflightRegistry<T> {
  private inflight = new Map<string, Promise<T>>();

  /**
   * Returns the in-flight promise for `key`, or starts `factory` and
   * registers it until it settles (success or failure).
   */
  run(key: string, factory: () => Promise<T>): { promise: Promise<T>; joined: boolean } {
    const existing = this.inflight.get(key);
    if (existing) {
      return { promise: existing, joined: true };
    }

    const promise = factory().finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, promise);
    return { promise, joined: false };
  }

  has(key: string): boolean {
    return this.inflight.has(key);
  }

  size(): number {
    return this.inflight.size;
  }
}

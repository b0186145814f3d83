import type { CacheEntry, CacheStore } from './cache.contracts.js';

/**
 * Process-local cache store. Used for STORAGE_DRIVER=memory and in tests.
 */
export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, CacheEntry>();

  async get(key: string, now: number): Promise<CacheEntry | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (entry.expiresAt <= now) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  async set(key: string, value: bigint, ttlSeconds: number, now: number): Promise<CacheEntry> {
    const entry: CacheEntry = {
      key,
      value,
      storedAt: now,
      expiresAt: now + ttlSeconds * 1000,
    };
    this.entries.set(key, entry);
    return entry;
  }

  size(): number {
    return this.entries.size;
  }
}

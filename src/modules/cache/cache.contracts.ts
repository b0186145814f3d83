/**
 * Cache store contract. Expiry is passive: stores compare `expiresAt`
 * against the caller's clock at read time.
 */

export interface CacheEntry {
  key: string;
  value: bigint;
  storedAt: number;
  expiresAt: number;
}

export interface CacheStore {
  get(key: string, now: number): Promise<CacheEntry | null>;
  set(key: string, value: bigint, ttlSeconds: number, now: number): Promise<CacheEntry>;
}

export interface CacheStats {
  hits: number;
  misses: number;
  fetches: number;
  collapsed: number;
  failures: number;
}

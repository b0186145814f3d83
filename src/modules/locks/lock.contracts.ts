/**
 * Lock store contract (idempotency guard backend).
 *
 * `acquire` must be atomic across processes: two concurrent callers for the
 * same key can never both succeed while a non-expired lock exists.
 */

export interface TradeLock {
  key: string;
  holderTaskId: string;
  acquiredAt: number;
  expiresAt: number;
}

export interface LockStore {
  acquire(key: string, holderTaskId: string, ttlMs: number, now: number): Promise<boolean>;
  /** Removes the lock only if `holderTaskId` still holds it. */
  release(key: string, holderTaskId: string): Promise<boolean>;
  get(key: string, now: number): Promise<TradeLock | null>;
}

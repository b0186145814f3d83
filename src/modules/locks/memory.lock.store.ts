import type { LockStore, TradeLock } from './lock.contracts.js';

/**
 * In-process lock table. The check-and-set runs without an await in
 * between, so it is atomic within one event loop; it does NOT coordinate
 * separate processes (use the Mongo store for that).
 */
export class MemoryLockStore implements LockStore {
  private locks = new Map<string, TradeLock>();

  async acquire(key: string, holderTaskId: string, ttlMs: number, now: number): Promise<boolean> {
    const existing = this.locks.get(key);
    if (existing && existing.expiresAt > now) {
      return false;
    }

    this.locks.set(key, {
      key,
      holderTaskId,
      acquiredAt: now,
      expiresAt: now + ttlMs,
    });
    return true;
  }

  async release(key: string, holderTaskId: string): Promise<boolean> {
    const lock = this.locks.get(key);
    if (lock && lock.holderTaskId === holderTaskId) {
      this.locks.delete(key);
      return true;
    }
    return false;
  }

  async get(key: string, now: number): Promise<TradeLock | null> {
    const lock = this.locks.get(key);
    if (!lock || lock.expiresAt <= now) return null;
    return { ...lock };
  }
}

/**
 * IDEMPOTENCY GUARD
 * =================
 *
 * At most one in-flight trade per (netuid, hotkey). The lock is taken on
 * behalf of a task id before the task exists and released by that task
 * once its terminal state is durable. Locks expire after `ttlSeconds` so a
 * crashed worker cannot wedge an account.
 */

import type { Logger } from '../../common/logger.js';
import { silentLogger } from '../../common/logger.js';
import type { LockStore, TradeLock } from '../locks/lock.contracts.js';

export class IdempotencyGuard {
  constructor(
    private readonly store: LockStore,
    private readonly ttlSeconds: number,
    private readonly logger: Logger = silentLogger,
    private readonly clock: () => number = Date.now,
  ) {}

  async tryAcquire(key: string, holderTaskId: string): Promise<boolean> {
    const granted = await this.store.acquire(key, holderTaskId, this.ttlSeconds * 1000, this.clock());
    this.logger.debug?.({ key, taskId: holderTaskId, granted }, 'Trade lock acquire');
    return granted;
  }

  async release(key: string, holderTaskId: string): Promise<boolean> {
    const released = await this.store.release(key, holderTaskId);
    if (!released) {
      this.logger.warn({ key, taskId: holderTaskId }, 'Trade lock not held by task at release');
    }
    return released;
  }

  async status(key: string): Promise<TradeLock | null> {
    return this.store.get(key, this.clock());
  }
}

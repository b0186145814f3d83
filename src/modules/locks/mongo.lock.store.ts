/**
 * Distributed trade lock via MongoDB.
 *
 * Acquire = upsert filtered on "this key, already expired":
 * - no document        → insert, granted
 * - expired document   → matched and overwritten, granted
 * - live document      → filter misses, upsert collides on _id (E11000), denied
 */

import { isDuplicateKeyError } from '../../db/mongoose.js';
import type { LockStore, TradeLock } from './lock.contracts.js';
import { TradeLockModel } from './lock.models.js';

export class MongoLockStore implements LockStore {
  async acquire(key: string, holderTaskId: string, ttlMs: number, now: number): Promise<boolean> {
    try {
      const doc = await TradeLockModel.findOneAndUpdate(
        { _id: key, expiresAt: { $lte: new Date(now) } },
        {
          $set: {
            holderTaskId,
            acquiredAt: new Date(now),
            expiresAt: new Date(now + ttlMs),
          },
        },
        { upsert: true, new: true },
      ).lean();

      return doc !== null && doc.holderTaskId === holderTaskId;
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        return false;
      }
      throw err;
    }
  }

  async release(key: string, holderTaskId: string): Promise<boolean> {
    const res = await TradeLockModel.deleteOne({ _id: key, holderTaskId });
    return res.deletedCount > 0;
  }

  async get(key: string, now: number): Promise<TradeLock | null> {
    const doc = await TradeLockModel.findOne({
      _id: key,
      expiresAt: { $gt: new Date(now) },
    }).lean();

    if (!doc) return null;

    return {
      key: doc._id,
      holderTaskId: doc.holderTaskId,
      acquiredAt: doc.acquiredAt.getTime(),
      expiresAt: doc.expiresAt.getTime(),
    };
  }
}

import { parseBigIntAmount } from '../../common/amounts.js';
import type { CacheEntry, CacheStore } from './cache.contracts.js';
import { CacheEntryModel } from './cache.models.js';

/**
 * Shared cache store backed by the `dividend_cache` collection.
 */
export class MongoCacheStore implements CacheStore {
  async get(key: string, now: number): Promise<CacheEntry | null> {
    const doc = await CacheEntryModel.findOne({
      _id: key,
      expiresAt: { $gt: new Date(now) },
    }).lean();

    if (!doc) return null;

    return {
      key: doc._id,
      value: parseBigIntAmount(doc.value),
      storedAt: doc.storedAt.getTime(),
      expiresAt: doc.expiresAt.getTime(),
    };
  }

  async set(key: string, value: bigint, ttlSeconds: number, now: number): Promise<CacheEntry> {
    const entry: CacheEntry = {
      key,
      value,
      storedAt: now,
      expiresAt: now + ttlSeconds * 1000,
    };

    await CacheEntryModel.updateOne(
      { _id: key },
      {
        $set: {
          value: value.toString(),
          storedAt: new Date(entry.storedAt),
          expiresAt: new Date(entry.expiresAt),
        },
      },
      { upsert: true },
    );

    return entry;
  }
}

/**
 * Dividend cache MongoDB model
 */

import mongoose, { Schema } from 'mongoose';

export interface ICacheEntryDoc {
  _id: string;          // fingerprint
  value: string;        // decimal string (bigint at rest)
  storedAt: Date;
  expiresAt: Date;
}

const CacheEntrySchema = new Schema<ICacheEntryDoc>({
  _id: { type: String, required: true },
  value: { type: String, required: true },
  storedAt: { type: Date, required: true },
  expiresAt: { type: Date, required: true },
}, {
  collection: 'dividend_cache',
  versionKey: false,
});

// Housekeeping only; reads never rely on the TTL monitor.
CacheEntrySchema.index({ expiresAt: 1 }, { expireAfterSeconds: 0 });

export const CacheEntryModel = mongoose.model<ICacheEntryDoc>('DividendCacheEntry', CacheEntrySchema);

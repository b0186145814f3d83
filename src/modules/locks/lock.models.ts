/**
 * Trade lock MongoDB model. `_id` is the guard key, so the unique primary
 * key index is what makes acquisition insert-if-absent.
 */

import mongoose, { Schema } from 'mongoose';

export interface ITradeLockDoc {
  _id: string;
  holderTaskId: string;
  acquiredAt: Date;
  expiresAt: Date;
}

const TradeLockSchema = new Schema<ITradeLockDoc>({
  _id: { type: String, required: true },
  holderTaskId: { type: String, required: true },
  acquiredAt: { type: Date, required: true },
  expiresAt: { type: Date, required: true },
}, {
  collection: 'trade_locks',
  versionKey: false,
});

TradeLockSchema.index({ expiresAt: 1 }, { expireAfterSeconds: 0 });

export const TradeLockModel = mongoose.model<ITradeLockDoc>('TradeLock', TradeLockSchema);

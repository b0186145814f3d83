/**
 * Trade job MongoDB model (durable queue).
 */

import mongoose, { Schema } from 'mongoose';
import type { QueueJobStatus } from './queue.contracts.js';

export interface ITradeJobDoc {
  _id: string;
  kind: 'sentiment_trade';
  taskId: string;
  netuid: number;
  hotkey: string;
  status: QueueJobStatus;
  deliveries: number;
  availableAt: Date;
  leaseOwner: string | null;
  leaseUntil: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

const TradeJobSchema = new Schema<ITradeJobDoc>({
  _id: { type: String, required: true },
  kind: { type: String, enum: ['sentiment_trade'], required: true },
  taskId: { type: String, required: true },
  netuid: { type: Number, required: true },
  hotkey: { type: String, required: true },
  status: { type: String, enum: ['queued', 'running', 'done', 'dead'], required: true },
  deliveries: { type: Number, default: 0 },
  availableAt: { type: Date, required: true },
  leaseOwner: { type: String, default: null },
  leaseUntil: { type: Date, default: null },
}, {
  collection: 'trade_jobs',
  timestamps: true,
  versionKey: false,
});

TradeJobSchema.index({ status: 1, availableAt: 1 });
TradeJobSchema.index({ status: 1, leaseUntil: 1 });
TradeJobSchema.index({ taskId: 1 });

export const TradeJobModel = mongoose.model<ITradeJobDoc>('TradeJob', TradeJobSchema);

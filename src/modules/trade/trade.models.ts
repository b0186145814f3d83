/**
 * Trade task MongoDB model.
 */

import mongoose, { Schema } from 'mongoose';
import type { OutcomeCode, TaskState, TradeDirection, TradeTaskKind } from './trade.contracts.js';

export interface ITradeTaskDoc {
  _id: string;            // taskId
  kind: TradeTaskKind;
  netuid: number;
  hotkey: string;
  requestedAt: Date;
  state: TaskState;
  sentimentScore: number | null;
  direction: TradeDirection;
  amount: number;
  txHash: string | null;
  error: string | null;
  outcome: OutcomeCode | null;
  attempts: number;
  updatedAt: Date;
}

const TradeTaskSchema = new Schema<ITradeTaskDoc>({
  _id: { type: String, required: true },
  kind: { type: String, enum: ['sentiment_trade', 'direct_trade'], required: true },
  netuid: { type: Number, required: true },
  hotkey: { type: String, required: true },
  requestedAt: { type: Date, required: true },
  state: {
    type: String,
    enum: ['PENDING', 'SCORING', 'DECIDING', 'SUBMITTING', 'CONFIRMED', 'FAILED'],
    required: true,
  },
  sentimentScore: { type: Number, default: null },
  direction: { type: String, enum: ['stake', 'unstake', 'none'], default: 'none' },
  amount: { type: Number, default: 0 },
  txHash: { type: String, default: null },
  error: { type: String, default: null },
  outcome: { type: String, default: null },
  attempts: { type: Number, default: 0 },
  updatedAt: { type: Date, required: true },
}, {
  collection: 'trade_tasks',
  versionKey: false,
});

TradeTaskSchema.index({ netuid: 1, hotkey: 1, requestedAt: -1 });
TradeTaskSchema.index({ state: 1, updatedAt: 1 });

export const TradeTaskModel = mongoose.model<ITradeTaskDoc>('TradeTask', TradeTaskSchema);

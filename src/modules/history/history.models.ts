/**
 * History MongoDB Models
 * ======================
 */

import mongoose, { Schema, Types } from 'mongoose';
import type { StakeOperationType } from '../chain/chain.contracts.js';
import type { SentimentDirection, StakeTransactionStatus, TradeTrigger } from './history.contracts.js';

// ═══════════════════════════════════════════════════════════════
// 1. DIVIDEND HISTORY
// ═══════════════════════════════════════════════════════════════

export interface IDividendRecordDoc {
  _id: Types.ObjectId;
  netuid: number;
  hotkey: string;
  dividend: string;     // decimal string, arbitrary precision
  source: 'chain';
  observedAt: Date;
}

const DividendRecordSchema = new Schema<IDividendRecordDoc>({
  netuid: { type: Number, required: true, index: true },
  hotkey: { type: String, required: true, index: true },
  dividend: { type: String, required: true },
  source: { type: String, enum: ['chain'], default: 'chain' },
  observedAt: { type: Date, required: true },
}, {
  collection: 'dividend_history',
  versionKey: false,
});

DividendRecordSchema.index({ netuid: 1, hotkey: 1, observedAt: -1 });
DividendRecordSchema.index({ observedAt: -1, _id: -1 });

export const DividendRecordModel = mongoose.model<IDividendRecordDoc>('DividendRecord', DividendRecordSchema);

// ═══════════════════════════════════════════════════════════════
// 2. STAKE TRANSACTIONS
// ═══════════════════════════════════════════════════════════════

export interface IStakeTransactionDoc {
  _id: Types.ObjectId;
  taskId: string;
  netuid: number;
  hotkey: string;
  operationType: StakeOperationType;
  amount: number;
  txHash: string | null;
  status: StakeTransactionStatus;
  error: string | null;
  sentimentScore: number | null;
  trigger: TradeTrigger;
  createdAt: Date;
  updatedAt: Date;
  settledAt: Date | null;
}

const StakeTransactionSchema = new Schema<IStakeTransactionDoc>({
  taskId: { type: String, required: true, unique: true },
  netuid: { type: Number, required: true, index: true },
  hotkey: { type: String, required: true, index: true },
  operationType: { type: String, required: true, enum: ['stake', 'unstake'], index: true },
  amount: { type: Number, required: true },
  txHash: { type: String, default: null, index: true },
  status: { type: String, required: true, enum: ['submitted', 'confirmed', 'failed'], default: 'submitted' },
  error: { type: String, default: null },
  sentimentScore: { type: Number, default: null },
  trigger: { type: String, required: true, enum: ['sentiment', 'direct'] },
  createdAt: { type: Date, required: true },
  updatedAt: { type: Date, required: true },
  settledAt: { type: Date, default: null },
}, {
  collection: 'stake_transactions',
  versionKey: false,
});

StakeTransactionSchema.index({ createdAt: -1, _id: -1 });

export const StakeTransactionModel = mongoose.model<IStakeTransactionDoc>('StakeTransaction', StakeTransactionSchema);

// ═══════════════════════════════════════════════════════════════
// 3. SENTIMENT ANALYSES
// ═══════════════════════════════════════════════════════════════

export interface ISentimentAnalysisDoc {
  _id: Types.ObjectId;
  taskId: string;
  netuid: number;
  hotkey: string;
  rawScore: number;
  score: number;
  postsCount: number;
  direction: SentimentDirection;
  createdAt: Date;
}

const SentimentAnalysisSchema = new Schema<ISentimentAnalysisDoc>({
  taskId: { type: String, required: true, index: true },
  netuid: { type: Number, required: true, index: true },
  hotkey: { type: String, required: true },
  rawScore: { type: Number, required: true },
  score: { type: Number, required: true },
  postsCount: { type: Number, required: true },
  direction: { type: String, required: true, enum: ['stake', 'unstake', 'none'] },
  createdAt: { type: Date, required: true },
}, {
  collection: 'sentiment_analyses',
  versionKey: false,
});

SentimentAnalysisSchema.index({ createdAt: -1, _id: -1 });

export const SentimentAnalysisModel = mongoose.model<ISentimentAnalysisDoc>('SentimentAnalysis', SentimentAnalysisSchema);

/**
 * Database Indexes
 * Run on startup (API and worker) before serving traffic.
 */

import type { Model } from 'mongoose';
import { errorMessage } from '../common/errors.js';
import { CacheEntryModel } from '../modules/cache/cache.models.js';
import {
  DividendRecordModel,
  SentimentAnalysisModel,
  StakeTransactionModel,
} from '../modules/history/history.models.js';
import { TradeLockModel } from '../modules/locks/lock.models.js';
import { TradeJobModel } from '../modules/queue/queue.models.js';
import { TradeTaskModel } from '../modules/trade/trade.models.js';

const MODELS: Array<Pick<Model<unknown>, 'createIndexes' | 'collection'>> = [
  CacheEntryModel,
  DividendRecordModel,
  StakeTransactionModel,
  SentimentAnalysisModel,
  TradeLockModel,
  TradeJobModel,
  TradeTaskModel,
];

export async function ensureIndexes(): Promise<void> {
  for (const model of MODELS) {
    try {
      await model.createIndexes();
      console.log(`[DB] ${model.collection.collectionName} indexes ensured`);
    } catch (err) {
      console.log(`[DB] ${model.collection.collectionName} indexes already exist or error:`, errorMessage(err));
    }
  }
  console.log('[DB] Indexes ensured');
}

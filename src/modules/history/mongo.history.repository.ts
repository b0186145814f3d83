/**
 * MongoDB history repositories.
 *
 * Writes are awaited acknowledged inserts/updates, so a resolved call means
 * the record is durable for readers. Pages sort by timestamp then `_id`,
 * both descending, which makes repeated reads deterministic.
 */

import type { FilterQuery } from 'mongoose';
import { parseBigIntAmount } from '../../common/amounts.js';
import { PersistenceError } from '../../common/errors.js';
import { isDuplicateKeyError } from '../../db/mongoose.js';
import type {
  DividendFilter,
  DividendHistoryRepository,
  DividendRecord,
  HistoryRepositories,
  NewDividendRecord,
  NewSentimentAnalysis,
  NewStakeTransaction,
  SentimentAnalysis,
  SentimentAnalysisRepository,
  SentimentFilter,
  Settlement,
  StakeTransaction,
  StakeTransactionRepository,
  TransactionFilter,
} from './history.contracts.js';
import {
  DividendRecordModel,
  type IDividendRecordDoc,
  type ISentimentAnalysisDoc,
  type IStakeTransactionDoc,
  SentimentAnalysisModel,
  StakeTransactionModel,
} from './history.models.js';

// ═══════════════════════════════════════════════════════════════
// DIVIDENDS
// ═══════════════════════════════════════════════════════════════

export class MongoDividendHistoryRepository implements DividendHistoryRepository {
  async append(record: NewDividendRecord): Promise<DividendRecord> {
    const doc = await DividendRecordModel.create({
      netuid: record.netuid,
      hotkey: record.hotkey,
      dividend: record.dividend.toString(),
      source: 'chain',
      observedAt: record.observedAt,
    });
    return this.toRecord(doc.toObject());
  }

  async list(filter: DividendFilter): Promise<DividendRecord[]> {
    const query: FilterQuery<IDividendRecordDoc> = {};
    if (filter.netuid !== undefined) query.netuid = filter.netuid;
    if (filter.hotkey !== undefined) query.hotkey = filter.hotkey;

    const docs = await DividendRecordModel.find(query)
      .sort({ observedAt: -1, _id: -1 })
      .skip(filter.offset)
      .limit(filter.limit)
      .lean();

    return docs.map((d) => this.toRecord(d));
  }

  private toRecord(doc: IDividendRecordDoc): DividendRecord {
    return {
      id: doc._id.toString(),
      netuid: doc.netuid,
      hotkey: doc.hotkey,
      dividend: parseBigIntAmount(doc.dividend),
      source: 'chain',
      observedAt: doc.observedAt,
    };
  }
}

// ═══════════════════════════════════════════════════════════════
// STAKE TRANSACTIONS
// ═══════════════════════════════════════════════════════════════

export class MongoStakeTransactionRepository implements StakeTransactionRepository {
  async insertSubmitted(tx: NewStakeTransaction): Promise<StakeTransaction> {
    try {
      const doc = await StakeTransactionModel.create({
        ...tx,
        status: 'submitted',
        txHash: null,
        error: null,
        updatedAt: tx.createdAt,
        settledAt: null,
      });
      return this.toTransaction(doc.toObject());
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new PersistenceError(`Stake transaction for task ${tx.taskId} already exists`);
      }
      throw err;
    }
  }

  async settle(taskId: string, settlement: Settlement): Promise<StakeTransaction | null> {
    // conditional on settledAt so a redelivered task cannot settle twice
    const doc = await StakeTransactionModel.findOneAndUpdate(
      { taskId, settledAt: null },
      {
        $set: {
          status: settlement.status,
          txHash: settlement.txHash,
          error: settlement.error,
          updatedAt: settlement.at,
          settledAt: settlement.at,
        },
      },
      { new: true },
    ).lean();

    return doc ? this.toTransaction(doc) : null;
  }

  async findByTask(taskId: string): Promise<StakeTransaction | null> {
    const doc = await StakeTransactionModel.findOne({ taskId }).lean();
    return doc ? this.toTransaction(doc) : null;
  }

  async list(filter: TransactionFilter): Promise<StakeTransaction[]> {
    const query: FilterQuery<IStakeTransactionDoc> = {};
    if (filter.netuid !== undefined) query.netuid = filter.netuid;
    if (filter.hotkey !== undefined) query.hotkey = filter.hotkey;
    if (filter.operationType !== undefined) query.operationType = filter.operationType;

    const docs = await StakeTransactionModel.find(query)
      .sort({ createdAt: -1, _id: -1 })
      .skip(filter.offset)
      .limit(filter.limit)
      .lean();

    return docs.map((d) => this.toTransaction(d));
  }

  private toTransaction(doc: IStakeTransactionDoc): StakeTransaction {
    return {
      id: doc._id.toString(),
      taskId: doc.taskId,
      netuid: doc.netuid,
      hotkey: doc.hotkey,
      operationType: doc.operationType,
      amount: doc.amount,
      txHash: doc.txHash ?? null,
      status: doc.status,
      error: doc.error ?? null,
      sentimentScore: doc.sentimentScore ?? null,
      trigger: doc.trigger,
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
      settledAt: doc.settledAt ?? null,
    };
  }
}

// ═══════════════════════════════════════════════════════════════
// SENTIMENT ANALYSES
// ═══════════════════════════════════════════════════════════════

export class MongoSentimentAnalysisRepository implements SentimentAnalysisRepository {
  async append(record: NewSentimentAnalysis): Promise<SentimentAnalysis> {
    const doc = await SentimentAnalysisModel.create(record);
    return this.toAnalysis(doc.toObject());
  }

  async list(filter: SentimentFilter): Promise<SentimentAnalysis[]> {
    const query: FilterQuery<ISentimentAnalysisDoc> = {};
    if (filter.netuid !== undefined) query.netuid = filter.netuid;
    if (filter.hotkey !== undefined) query.hotkey = filter.hotkey;

    const docs = await SentimentAnalysisModel.find(query)
      .sort({ createdAt: -1, _id: -1 })
      .skip(filter.offset)
      .limit(filter.limit)
      .lean();

    return docs.map((d) => this.toAnalysis(d));
  }

  private toAnalysis(doc: ISentimentAnalysisDoc): SentimentAnalysis {
    return {
      id: doc._id.toString(),
      taskId: doc.taskId,
      netuid: doc.netuid,
      hotkey: doc.hotkey,
      rawScore: doc.rawScore,
      score: doc.score,
      postsCount: doc.postsCount,
      direction: doc.direction,
      createdAt: doc.createdAt,
    };
  }
}

export function createMongoHistory(): HistoryRepositories {
  return {
    dividends: new MongoDividendHistoryRepository(),
    transactions: new MongoStakeTransactionRepository(),
    sentiment: new MongoSentimentAnalysisRepository(),
  };
}

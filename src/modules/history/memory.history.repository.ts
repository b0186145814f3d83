/**
 * In-memory history repositories (STORAGE_DRIVER=memory, tests).
 */

import { v4 as uuidv4 } from 'uuid';
import { PersistenceError } from '../../common/errors.js';
import type {
  DividendFilter,
  DividendHistoryRepository,
  DividendRecord,
  HistoryRepositories,
  NewDividendRecord,
  NewSentimentAnalysis,
  NewStakeTransaction,
  Page,
  SentimentAnalysis,
  SentimentAnalysisRepository,
  SentimentFilter,
  Settlement,
  StakeTransaction,
  StakeTransactionRepository,
  TransactionFilter,
} from './history.contracts.js';

interface Sequenced<T> {
  seq: number;
  at: number;
  row: T;
}

/** newest first, insertion order breaks ties */
function page<T>(rows: Sequenced<T>[], filter: Page): T[] {
  return [...rows]
    .sort((a, b) => b.at - a.at || b.seq - a.seq)
    .slice(filter.offset, filter.offset + filter.limit)
    .map((r) => r.row);
}

export class MemoryDividendHistoryRepository implements DividendHistoryRepository {
  private rows: Sequenced<DividendRecord>[] = [];
  private seq = 0;

  async append(record: NewDividendRecord): Promise<DividendRecord> {
    const row: DividendRecord = { ...record, id: uuidv4(), source: 'chain' };
    this.rows.push({ seq: ++this.seq, at: row.observedAt.getTime(), row });
    return row;
  }

  async list(filter: DividendFilter): Promise<DividendRecord[]> {
    const matching = this.rows.filter(({ row }) =>
      (filter.netuid === undefined || row.netuid === filter.netuid) &&
      (filter.hotkey === undefined || row.hotkey === filter.hotkey),
    );
    return page(matching, filter);
  }
}

export class MemoryStakeTransactionRepository implements StakeTransactionRepository {
  private rows: Sequenced<StakeTransaction>[] = [];
  private seq = 0;

  async insertSubmitted(tx: NewStakeTransaction): Promise<StakeTransaction> {
    if (this.rows.some(({ row }) => row.taskId === tx.taskId)) {
      throw new PersistenceError(`Stake transaction for task ${tx.taskId} already exists`);
    }
    const row: StakeTransaction = {
      ...tx,
      id: uuidv4(),
      status: 'submitted',
      txHash: null,
      error: null,
      updatedAt: tx.createdAt,
      settledAt: null,
    };
    this.rows.push({ seq: ++this.seq, at: row.createdAt.getTime(), row });
    return { ...row };
  }

  async settle(taskId: string, settlement: Settlement): Promise<StakeTransaction | null> {
    const entry = this.rows.find(({ row }) => row.taskId === taskId && row.settledAt === null);
    if (!entry) return null;

    entry.row = {
      ...entry.row,
      status: settlement.status,
      txHash: settlement.txHash,
      error: settlement.error,
      updatedAt: settlement.at,
      settledAt: settlement.at,
    };
    return { ...entry.row };
  }

  async findByTask(taskId: string): Promise<StakeTransaction | null> {
    const entry = this.rows.find(({ row }) => row.taskId === taskId);
    return entry ? { ...entry.row } : null;
  }

  async list(filter: TransactionFilter): Promise<StakeTransaction[]> {
    const matching = this.rows.filter(({ row }) =>
      (filter.netuid === undefined || row.netuid === filter.netuid) &&
      (filter.hotkey === undefined || row.hotkey === filter.hotkey) &&
      (filter.operationType === undefined || row.operationType === filter.operationType),
    );
    return page(matching, filter).map((row) => ({ ...row }));
  }
}

export class MemorySentimentAnalysisRepository implements SentimentAnalysisRepository {
  private rows: Sequenced<SentimentAnalysis>[] = [];
  private seq = 0;

  async append(record: NewSentimentAnalysis): Promise<SentimentAnalysis> {
    const row: SentimentAnalysis = { ...record, id: uuidv4() };
    this.rows.push({ seq: ++this.seq, at: row.createdAt.getTime(), row });
    return row;
  }

  async list(filter: SentimentFilter): Promise<SentimentAnalysis[]> {
    const matching = this.rows.filter(({ row }) =>
      (filter.netuid === undefined || row.netuid === filter.netuid) &&
      (filter.hotkey === undefined || row.hotkey === filter.hotkey),
    );
    return page(matching, filter);
  }
}

export function createMemoryHistory(): HistoryRepositories {
  return {
    dividends: new MemoryDividendHistoryRepository(),
    transactions: new MemoryStakeTransactionRepository(),
    sentiment: new MemorySentimentAnalysisRepository(),
  };
}

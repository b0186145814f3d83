/**
 * History Contracts
 * =================
 *
 * Append-only records of dividend observations, stake transactions and
 * sentiment analyses, plus the paginated read filters. Reads are always
 * newest-first with a stable tie-break.
 */

import type { StakeOperationType } from '../chain/chain.contracts.js';

// ═══════════════════════════════════════════════════════════════
// RECORDS
// ═══════════════════════════════════════════════════════════════

export interface DividendRecord {
  id: string;
  netuid: number;
  hotkey: string;
  dividend: bigint;
  source: 'chain';
  observedAt: Date;
}

export type StakeTransactionStatus = 'submitted' | 'confirmed' | 'failed';
export type TradeTrigger = 'sentiment' | 'direct';

export interface StakeTransaction {
  id: string;
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

export type SentimentDirection = StakeOperationType | 'none';

export interface SentimentAnalysis {
  id: string;
  taskId: string;
  netuid: number;
  hotkey: string;
  rawScore: number;      // -100..100 as returned by the scorer
  score: number;         // -1..1
  postsCount: number;
  direction: SentimentDirection;
  createdAt: Date;
}

// ═══════════════════════════════════════════════════════════════
// FILTERS
// ═══════════════════════════════════════════════════════════════

export interface Page {
  limit: number;
  offset: number;
}

export interface DividendFilter extends Page {
  netuid?: number;
  hotkey?: string;
}

export interface TransactionFilter extends Page {
  netuid?: number;
  hotkey?: string;
  operationType?: StakeOperationType;
}

export type SentimentFilter = DividendFilter;

export const DEFAULT_PAGE_LIMIT = 100;
export const MAX_PAGE_LIMIT = 1000;

// ═══════════════════════════════════════════════════════════════
// REPOSITORIES
// ═══════════════════════════════════════════════════════════════

export type NewDividendRecord = Omit<DividendRecord, 'id' | 'source'>;

export type NewStakeTransaction = Omit<
  StakeTransaction,
  'id' | 'status' | 'txHash' | 'error' | 'createdAt' | 'updatedAt' | 'settledAt'
> & {
  createdAt: Date;
};

/** `submitted` with a hash = accepted but not yet finalized on chain. */
export interface Settlement {
  status: StakeTransactionStatus;
  txHash: string | null;
  error: string | null;
  at: Date;
}

export type NewSentimentAnalysis = Omit<SentimentAnalysis, 'id'>;

export interface DividendHistoryRepository {
  append(record: NewDividendRecord): Promise<DividendRecord>;
  list(filter: DividendFilter): Promise<DividendRecord[]>;
}

export interface StakeTransactionRepository {
  /** One row per task; a second insert for the same taskId is rejected. */
  insertSubmitted(tx: NewStakeTransaction): Promise<StakeTransaction>;
  /**
   * Settles an unsettled row exactly once. Returns null when the row is
   * missing or already settled.
   */
  settle(taskId: string, settlement: Settlement): Promise<StakeTransaction | null>;
  findByTask(taskId: string): Promise<StakeTransaction | null>;
  list(filter: TransactionFilter): Promise<StakeTransaction[]>;
}

export interface SentimentAnalysisRepository {
  append(record: NewSentimentAnalysis): Promise<SentimentAnalysis>;
  list(filter: SentimentFilter): Promise<SentimentAnalysis[]>;
}

export interface HistoryRepositories {
  dividends: DividendHistoryRepository;
  transactions: StakeTransactionRepository;
  sentiment: SentimentAnalysisRepository;
}

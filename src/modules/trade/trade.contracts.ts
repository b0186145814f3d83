/**
 * Trade Task Contracts
 * ====================
 *
 * A TradeTask is the record of one guarded trade attempt for an account,
 * from PENDING to a terminal CONFIRMED / FAILED state.
 */

import type { Page } from '../history/history.contracts.js';

// ═══════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════

export type TaskState =
  | 'PENDING'
  | 'SCORING'
  | 'DECIDING'
  | 'SUBMITTING'
  | 'CONFIRMED'
  | 'FAILED';

export const TERMINAL_STATES: readonly TaskState[] = ['CONFIRMED', 'FAILED'];
export const ACTIVE_STATES: readonly TaskState[] = ['PENDING', 'SCORING', 'DECIDING', 'SUBMITTING'];

export function isTerminal(state: TaskState): boolean {
  return TERMINAL_STATES.includes(state);
}

export type TradeDirection = 'stake' | 'unstake' | 'none';

export type OutcomeCode =
  | 'SUBMITTED'
  | 'NEUTRAL_SENTIMENT'  // non-error: nothing to do
  | 'NO_DATA'            // non-error: nothing to score
  | 'ENQUEUE_FAILED'
  | 'SCORING_FAILED'
  | 'SUBMISSION_FAILED'
  | 'SUBMISSION_UNKNOWN' // submission may have reached the chain; needs reconciliation
  | 'TASK_TIMEOUT';

export const NON_ERROR_OUTCOMES: readonly OutcomeCode[] = ['SUBMITTED', 'NEUTRAL_SENTIMENT', 'NO_DATA'];

export type TradeTaskKind = 'sentiment_trade' | 'direct_trade';

// ═══════════════════════════════════════════════════════════════
// TASK
// ═══════════════════════════════════════════════════════════════

export interface TradeTask {
  taskId: string;
  kind: TradeTaskKind;
  netuid: number;
  hotkey: string;
  requestedAt: Date;
  state: TaskState;
  sentimentScore: number | null;   // -1..1
  direction: TradeDirection;
  amount: number;
  txHash: string | null;
  error: string | null;
  outcome: OutcomeCode | null;
  attempts: number;
  updatedAt: Date;
}

export interface NewTradeTask {
  taskId: string;
  kind: TradeTaskKind;
  netuid: number;
  hotkey: string;
  requestedAt: Date;
  direction?: TradeDirection;
  amount?: number;
}

export type TradeTaskPatch = Partial<
  Pick<TradeTask, 'sentimentScore' | 'direction' | 'amount' | 'txHash' | 'error' | 'outcome' | 'attempts'>
> & {
  state: TaskState;
  updatedAt: Date;
};

export interface TradeTaskFilter extends Page {
  netuid?: number;
  hotkey?: string;
  state?: TaskState;
}

// ═══════════════════════════════════════════════════════════════
// REPOSITORY
// ═══════════════════════════════════════════════════════════════

export interface TradeTaskRepository {
  create(task: NewTradeTask): Promise<TradeTask>;
  get(taskId: string): Promise<TradeTask | null>;
  /**
   * Applies `patch` only while the task is in one of `from`. Returns null
   * when the task is missing or has moved on.
   */
  transition(taskId: string, from: readonly TaskState[], patch: TradeTaskPatch): Promise<TradeTask | null>;
  list(filter: TradeTaskFilter): Promise<TradeTask[]>;
  /** Non-terminal tasks not updated since `olderThan`. */
  listStale(olderThan: Date, limit: number): Promise<TradeTask[]>;
}

// ═══════════════════════════════════════════════════════════════
// API SHAPE
// ═══════════════════════════════════════════════════════════════

export interface TradeTaskJson {
  task_id: string;
  kind: TradeTaskKind;
  netuid: number;
  hotkey: string;
  state: TaskState;
  sentiment_score: number | null;
  direction: TradeDirection;
  amount: number;
  tx_hash: string | null;
  error: string | null;
  outcome: OutcomeCode | null;
  attempts: number;
  requested_at: string;
  updated_at: string;
}

export function toTradeTaskJson(task: TradeTask): TradeTaskJson {
  return {
    task_id: task.taskId,
    kind: task.kind,
    netuid: task.netuid,
    hotkey: task.hotkey,
    state: task.state,
    sentiment_score: task.sentimentScore,
    direction: task.direction,
    amount: task.amount,
    tx_hash: task.txHash,
    error: task.error,
    outcome: task.outcome,
    attempts: task.attempts,
    requested_at: task.requestedAt.toISOString(),
    updated_at: task.updatedAt.toISOString(),
  };
}

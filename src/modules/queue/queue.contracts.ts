/**
 * Task Queue Contracts
 * ====================
 *
 * Durable, at-least-once job queue shared by the API (producer) and the
 * worker pool (consumer). A claimed job carries a lease; a job whose lease
 * lapses without an ack is delivered again.
 */

// ═══════════════════════════════════════════════════════════════
// JOBS
// ═══════════════════════════════════════════════════════════════

export interface SentimentTradeJob {
  kind: 'sentiment_trade';
  taskId: string;
  netuid: number;
  hotkey: string;
}

/** Tagged union of every job the workers know how to run. */
export type TradeJob = SentimentTradeJob;

export type QueueJobStatus = 'queued' | 'running' | 'done' | 'dead';

export interface ClaimedJob {
  jobId: string;
  job: TradeJob;
  deliveries: number;
  leaseOwner: string;
  leaseUntil: number;
}

export interface QueueStats {
  queued: number;
  running: number;
  done: number;
  dead: number;
}

// Jobs released this many times are parked as dead instead of requeued
export const MAX_DELIVERIES = 5;

// ═══════════════════════════════════════════════════════════════
// QUEUE
// ═══════════════════════════════════════════════════════════════

export interface TaskQueue {
  enqueue(job: TradeJob, now: number): Promise<string>;
  /** Oldest available job, leased to `owner` for `leaseMs`, or null. */
  claim(owner: string, leaseMs: number, now: number): Promise<ClaimedJob | null>;
  ack(jobId: string, owner: string): Promise<boolean>;
  /** Gives the job back before its lease lapses (crash path). */
  release(jobId: string, owner: string, now: number): Promise<boolean>;
  stats(): Promise<QueueStats>;
}

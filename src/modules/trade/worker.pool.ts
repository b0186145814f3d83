/**
 * WORKER POOL
 * ===========
 *
 * `concurrency` loops, each claiming one job at a time from the shared
 * queue. A processed job is acked; a job whose run throws gets its lease
 * released so another delivery can pick it up.
 */

import { v4 as uuidv4 } from 'uuid';
import { sleep as defaultSleep } from '../../common/async.js';
import { errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import type { ClaimedJob, TaskQueue, TradeJob } from '../queue/queue.contracts.js';
import type { TaskRunResult, TradeOrchestrator } from './trade.orchestrator.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface WorkerPoolConfig {
  concurrency: number;
  pollMs: number;
  leaseMs: number;
}

export interface WorkerPoolDeps {
  queue: TaskQueue;
  orchestrator: Pick<TradeOrchestrator, 'process'>;
  logger: Logger;
  config: WorkerPoolConfig;
  workerId?: string;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface WorkerPoolStatus {
  workerId: string;
  running: boolean;
  concurrency: number;
  active: number;
  processed: number;
  failed: number;
  startedAt: string | null;
  lastJobAt: string | null;
  lastError: string | null;
}

// ═══════════════════════════════════════════════════════════════
// POOL
// ═══════════════════════════════════════════════════════════════

export class WorkerPool {
  readonly workerId: string;
  private running = false;
  private loops: Promise<void>[] = [];
  private active = 0;
  private processed = 0;
  private failed = 0;
  private startedAt: number | null = null;
  private lastJobAt: number | null = null;
  private lastError: string | null = null;
  private clock: () => number;
  private sleep: (ms: number) => Promise<void>;

  constructor(private readonly deps: WorkerPoolDeps) {
    this.workerId = deps.workerId ?? `worker-${uuidv4().slice(0, 8)}`;
    this.clock = deps.clock ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.startedAt = this.clock();

    for (let slot = 0; slot < this.deps.config.concurrency; slot++) {
      this.loops.push(this.loop(`${this.workerId}:${slot}`));
    }
    this.deps.logger.info(
      { workerId: this.workerId, concurrency: this.deps.config.concurrency },
      'Worker pool started',
    );
  }

  /** Stops claiming new jobs and waits for in-flight ones. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await Promise.all(this.loops);
    this.loops = [];
    this.deps.logger.info({ workerId: this.workerId, processed: this.processed }, 'Worker pool stopped');
  }

  /**
   * Claims and runs at most one job.
   * @returns false when the queue had nothing available
   */
  async runOnce(owner: string = `${this.workerId}:0`): Promise<boolean> {
    const { queue, config } = this.deps;

    const claimed = await queue.claim(owner, config.leaseMs, this.clock());
    if (!claimed) return false;

    this.active++;
    try {
      const result = await this.dispatch(claimed.job);
      await queue.ack(claimed.jobId, owner);
      this.processed++;
      this.deps.logger.debug?.(
        { jobId: claimed.jobId, taskId: result.taskId, state: result.state, skipped: result.skipped },
        'Job completed',
      );
    } catch (err) {
      await this.giveBack(claimed, owner, err);
    } finally {
      this.active--;
      this.lastJobAt = this.clock();
    }
    return true;
  }

  status(): WorkerPoolStatus {
    return {
      workerId: this.workerId,
      running: this.running,
      concurrency: this.deps.config.concurrency,
      active: this.active,
      processed: this.processed,
      failed: this.failed,
      startedAt: this.startedAt === null ? null : new Date(this.startedAt).toISOString(),
      lastJobAt: this.lastJobAt === null ? null : new Date(this.lastJobAt).toISOString(),
      lastError: this.lastError,
    };
  }

  private async dispatch(job: TradeJob): Promise<TaskRunResult> {
    switch (job.kind) {
      case 'sentiment_trade':
        return this.deps.orchestrator.process(job);
      default: {
        const unsupported: TradeJob = job;
        throw new Error(`Unsupported job: ${JSON.stringify(unsupported)}`);
      }
    }
  }

  private async giveBack(claimed: ClaimedJob, owner: string, err: unknown): Promise<void> {
    this.failed++;
    this.lastError = errorMessage(err);
    this.deps.logger.error(
      { jobId: claimed.jobId, taskId: claimed.job.taskId, deliveries: claimed.deliveries, err: this.lastError },
      'Job run failed, releasing lease',
    );
    await this.deps.queue.release(claimed.jobId, owner, this.clock());
  }

  private async loop(owner: string): Promise<void> {
    while (this.running) {
      let worked = false;
      try {
        worked = await this.runOnce(owner);
      } catch (err) {
        // queue unreachable: back off and keep polling
        this.lastError = errorMessage(err);
        this.deps.logger.error({ owner, err: this.lastError }, 'Worker loop error');
      }
      if (!worked && this.running) {
        await this.sleep(this.deps.config.pollMs);
      }
    }
  }
}

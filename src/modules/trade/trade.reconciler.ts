/**
 * TRADE RECONCILER CRON
 *
 * Every minute: non-terminal tasks untouched for longer than the lock TTL
 * are failed with TASK_TIMEOUT. Their locks have already lapsed, so no
 * lock is touched here.
 */

import cron, { type ScheduledTask } from 'node-cron';
import { errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import { ACTIVE_STATES, type TradeTaskRepository } from './trade.contracts.js';

export interface ReconcileResult {
  checked: number;
  failed: number;
}

export interface TradeReconcilerDeps {
  tasks: TradeTaskRepository;
  logger: Logger;
  staleAfterMs: number;
  batchSize?: number;
  clock?: () => number;
}

export class TradeReconciler {
  private job: ScheduledTask | null = null;
  private inProgress = false;
  private clock: () => number;

  constructor(private readonly deps: TradeReconcilerDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  async reconcile(): Promise<ReconcileResult> {
    const { tasks, logger, staleAfterMs } = this.deps;
    const now = this.clock();
    const stale = await tasks.listStale(new Date(now - staleAfterMs), this.deps.batchSize ?? 100);

    let failed = 0;
    for (const task of stale) {
      const updated = await tasks.transition(task.taskId, ACTIVE_STATES, {
        state: 'FAILED',
        outcome: 'TASK_TIMEOUT',
        error: task.state === 'SUBMITTING'
          ? 'Task stalled while submitting; submission outcome unknown'
          : `Task stalled in ${task.state}`,
        updatedAt: new Date(now),
      });
      if (updated) {
        failed++;
        logger.warn({ taskId: task.taskId, state: task.state }, 'Stale trade task failed');
      }
    }

    return { checked: stale.length, failed };
  }

  start(expression = '* * * * *'): void {
    if (this.job) return;

    this.job = cron.schedule(expression, async () => {
      if (this.inProgress) return;
      this.inProgress = true;
      try {
        const res = await this.reconcile();
        if (res.failed > 0) {
          console.log(`[Trade Reconciler] Checked: ${res.checked}, Failed: ${res.failed}`);
        }
      } catch (e) {
        this.deps.logger.error({ err: errorMessage(e) }, 'Trade reconciliation failed');
      } finally {
        this.inProgress = false;
      }
    });

    console.log('[Trade] Reconciler cron started (every minute)');
  }

  stop(): void {
    this.job?.stop();
    this.job = null;
  }
}

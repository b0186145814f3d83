/**
 * TRADE ORCHESTRATOR
 * ==================
 *
 * Runs one sentiment-triggered trade task through
 * PENDING → SCORING → DECIDING → SUBMITTING → CONFIRMED | FAILED.
 *
 * Rules:
 * - every state write is conditional on the expected current state
 * - terminal state is persisted first, the guard lock released second;
 *   a failed terminal write leaves the lock to expire
 * - the whole task is bounded by `taskDeadlineMs` (shorter than the lock TTL)
 * - redelivery: terminal → skip, SCORING/DECIDING → rescore,
 *   SUBMITTING → SUBMISSION_UNKNOWN (never resubmitted)
 */

import { withRetry, withTimeout } from '../../common/async.js';
import { NoDataError, errorMessage, isTransientError } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import { tradeKey } from '../dividends/dividend.contracts.js';
import type { SentimentTradeJob } from '../queue/queue.contracts.js';
import type { SentimentProvider, SentimentScore } from '../sentiment/sentiment.contracts.js';
import type { IdempotencyGuard } from './idempotency.guard.js';
import type { StakeSubmitter } from './stake.submitter.js';
import {
  NON_ERROR_OUTCOMES,
  isTerminal,
  type OutcomeCode,
  type TaskState,
  type TradeTask,
  type TradeTaskPatch,
  type TradeTaskRepository,
} from './trade.contracts.js';
import { decideTrade, type TradePolicy } from './trade.policy.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface TradeOrchestratorConfig {
  retryAttempts: number;
  retryBaseDelayMs: number;
  sentimentTimeoutMs: number;
  taskDeadlineMs: number;
  policy: TradePolicy;
}

export interface TradeOrchestratorDeps {
  tasks: TradeTaskRepository;
  sentiment: SentimentProvider;
  submitter: StakeSubmitter;
  guard: IdempotencyGuard;
  logger: Logger;
  config: TradeOrchestratorConfig;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface TaskRunResult {
  taskId: string;
  state: TaskState | null;
  outcome: OutcomeCode | null;
  /** true when this run made no transition (missing, terminal or raced task) */
  skipped: boolean;
}

type TerminalPatch = Omit<TradeTaskPatch, 'updatedAt' | 'state'> & {
  state: 'CONFIRMED' | 'FAILED';
  outcome: OutcomeCode;
};

const PRE_SUBMIT_STATES: readonly TaskState[] = ['PENDING', 'SCORING', 'DECIDING'];

// ═══════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════

export class TradeOrchestrator {
  private clock: () => number;

  constructor(private readonly deps: TradeOrchestratorDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  async process(job: SentimentTradeJob): Promise<TaskRunResult> {
    const { tasks, logger, config } = this.deps;

    const task = await tasks.get(job.taskId);
    if (!task) {
      logger.warn({ taskId: job.taskId }, 'Job references unknown task, dropping');
      return { taskId: job.taskId, state: null, outcome: null, skipped: true };
    }

    if (isTerminal(task.state)) {
      logger.info({ taskId: task.taskId, state: task.state }, 'Task already terminal, skipping redelivery');
      return { taskId: task.taskId, state: task.state, outcome: task.outcome, skipped: true };
    }

    if (task.state === 'SUBMITTING') {
      return this.finish(task, ['SUBMITTING'], {
        state: 'FAILED',
        outcome: 'SUBMISSION_UNKNOWN',
        error: 'Task was redelivered while submitting; submission outcome unknown',
      });
    }

    const deadlineAt = task.requestedAt.getTime() + config.taskDeadlineMs;
    if (this.remaining(deadlineAt) <= 0) {
      return this.finish(task, PRE_SUBMIT_STATES, this.timeoutPatch());
    }

    // ── PENDING | SCORING | DECIDING → SCORING ──
    const scoring = await tasks.transition(task.taskId, PRE_SUBMIT_STATES, {
      state: 'SCORING',
      attempts: task.attempts + 1,
      updatedAt: this.now(),
    });
    if (!scoring) return this.lostRace(task.taskId);

    let sentiment: SentimentScore;
    try {
      sentiment = await this.score(scoring, deadlineAt);
    } catch (err) {
      if (err instanceof NoDataError) {
        return this.finish(scoring, ['SCORING'], { state: 'FAILED', outcome: 'NO_DATA', error: err.message });
      }
      if (this.remaining(deadlineAt) <= 0) {
        return this.finish(scoring, ['SCORING'], this.timeoutPatch());
      }
      return this.finish(scoring, ['SCORING'], {
        state: 'FAILED',
        outcome: 'SCORING_FAILED',
        error: errorMessage(err),
      });
    }

    // ── SCORING → DECIDING ──
    const deciding = await tasks.transition(scoring.taskId, ['SCORING'], {
      state: 'DECIDING',
      sentimentScore: sentiment.score,
      updatedAt: this.now(),
    });
    if (!deciding) return this.lostRace(scoring.taskId);

    const { direction, amount } = decideTrade(sentiment.score, config.policy);
    if (direction === 'none') {
      return this.finish(deciding, ['DECIDING'], {
        state: 'FAILED',
        outcome: 'NEUTRAL_SENTIMENT',
        error: 'Neutral sentiment, no action',
      });
    }
    if (this.remaining(deadlineAt) <= 0) {
      return this.finish(deciding, ['DECIDING'], this.timeoutPatch());
    }

    // ── DECIDING → SUBMITTING ──
    const submitting = await tasks.transition(deciding.taskId, ['DECIDING'], {
      state: 'SUBMITTING',
      direction,
      amount,
      updatedAt: this.now(),
    });
    if (!submitting) return this.lostRace(deciding.taskId);

    const outcome = await this.deps.submitter.submit({
      taskId: submitting.taskId,
      netuid: submitting.netuid,
      hotkey: submitting.hotkey,
      operation: direction,
      amount,
      trigger: 'sentiment',
      sentimentScore: sentiment.score,
    }, deadlineAt);

    // ── SUBMITTING → CONFIRMED | FAILED ──
    switch (outcome.status) {
      case 'confirmed':
        return this.finish(submitting, ['SUBMITTING'], {
          state: 'CONFIRMED',
          outcome: 'SUBMITTED',
          txHash: outcome.txHash,
          error: null,
        });
      case 'failed':
        return this.finish(submitting, ['SUBMITTING'], {
          state: 'FAILED',
          outcome: 'SUBMISSION_FAILED',
          error: outcome.error,
        });
      case 'unknown':
        return this.finish(submitting, ['SUBMITTING'], {
          state: 'FAILED',
          outcome: 'SUBMISSION_UNKNOWN',
          error: outcome.error,
        });
    }
  }

  private async score(task: TradeTask, deadlineAt: number): Promise<SentimentScore> {
    const { config, logger, sentiment } = this.deps;

    return withRetry(
      () => withTimeout(
        sentiment.score({ taskId: task.taskId, netuid: task.netuid, hotkey: task.hotkey }),
        Math.max(1, Math.min(config.sentimentTimeoutMs, this.remaining(deadlineAt))),
        'Sentiment scoring',
      ),
      {
        attempts: config.retryAttempts,
        baseDelayMs: config.retryBaseDelayMs,
        isRetriable: (err) => isTransientError(err) && this.remaining(deadlineAt) > 0,
        onRetry: (err, attempt, delayMs) =>
          logger.warn({ taskId: task.taskId, attempt, delayMs, err: errorMessage(err) }, 'Retrying sentiment scoring'),
        sleep: this.deps.sleep,
      },
    );
  }

  /**
   * Persists the terminal state, then releases the guard lock. A failed
   * write propagates and the lock is left to expire.
   */
  private async finish(task: TradeTask, from: readonly TaskState[], patch: TerminalPatch): Promise<TaskRunResult> {
    const { tasks, guard, logger } = this.deps;

    const updated = await tasks.transition(task.taskId, from, { ...patch, updatedAt: this.now() });
    if (!updated) return this.lostRace(task.taskId);

    try {
      await guard.release(tradeKey(task), task.taskId);
    } catch (err) {
      logger.error({ taskId: task.taskId, err: errorMessage(err) }, 'Trade lock release failed, lock will expire');
    }

    const context = {
      taskId: task.taskId,
      netuid: task.netuid,
      hotkey: task.hotkey,
      outcome: patch.outcome,
      txHash: updated.txHash,
      error: updated.error,
    };
    if (NON_ERROR_OUTCOMES.includes(patch.outcome)) {
      logger.info(context, `Trade task ${patch.state}`);
    } else {
      logger.warn(context, `Trade task ${patch.state}`);
    }

    return { taskId: updated.taskId, state: updated.state, outcome: updated.outcome, skipped: false };
  }

  private async lostRace(taskId: string): Promise<TaskRunResult> {
    const current = await this.deps.tasks.get(taskId);
    this.deps.logger.warn({ taskId, state: current?.state ?? null }, 'Task changed concurrently, stopping this run');
    return {
      taskId,
      state: current?.state ?? null,
      outcome: current?.outcome ?? null,
      skipped: true,
    };
  }

  private timeoutPatch(): TerminalPatch {
    return {
      state: 'FAILED',
      outcome: 'TASK_TIMEOUT',
      error: `Task exceeded its ${this.deps.config.taskDeadlineMs}ms deadline`,
    };
  }

  private remaining(deadlineAt: number): number {
    return deadlineAt - this.clock();
  }

  private now(): Date {
    return new Date(this.clock());
  }
}

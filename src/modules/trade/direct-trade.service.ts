/**
 * Direct Trade Service
 * ====================
 *
 * Operator-initiated stake / unstake without sentiment scoring. Runs
 * inline with the request but takes the same per-account guard lock and
 * leaves the same task and transaction records as the async path.
 */

import { v4 as uuidv4 } from 'uuid';
import { ConflictError, errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import type { StakeOperationType } from '../chain/chain.contracts.js';
import { parseDividendQuery, tradeKey, type DividendQuery } from '../dividends/dividend.contracts.js';
import type { IdempotencyGuard } from './idempotency.guard.js';
import type { StakeSubmitter } from './stake.submitter.js';
import type { OutcomeCode, TradeTaskRepository } from './trade.contracts.js';

export interface DirectTradeRequest extends DividendQuery {
  operation: StakeOperationType;
  amount: number;
}

/** Response shape of the direct trade endpoints. */
export interface DirectTradeResult {
  task_id: string;
  hotkey: string;
  netuid: number;
  amount: number;
  operation_type: StakeOperationType;
  tx_hash: string | null;
  success: boolean;
  error: string | null;
}

export interface DirectTradeDeps {
  tasks: TradeTaskRepository;
  guard: IdempotencyGuard;
  submitter: StakeSubmitter;
  logger: Logger;
  clock?: () => number;
  newTaskId?: () => string;
}

export class DirectTradeService {
  private clock: () => number;
  private newTaskId: () => string;

  constructor(private readonly deps: DirectTradeDeps) {
    this.clock = deps.clock ?? Date.now;
    this.newTaskId = deps.newTaskId ?? uuidv4;
  }

  /**
   * @throws ValidationError on a malformed account, before any lock is taken
   * @throws ConflictError when a trade for the account is already in flight
   */
  async execute(request: DirectTradeRequest): Promise<DirectTradeResult> {
    const { tasks, guard, submitter, logger } = this.deps;
    const req = { ...request, ...parseDividendQuery(request) };
    const key = tradeKey(req);
    const taskId = this.newTaskId();

    if (!(await guard.tryAcquire(key, taskId))) {
      throw new ConflictError(`A trade for ${key} is already in flight`);
    }

    try {
      await tasks.create({
        taskId,
        kind: 'direct_trade',
        netuid: req.netuid,
        hotkey: req.hotkey,
        requestedAt: new Date(this.clock()),
        direction: req.operation,
        amount: req.amount,
      });
      await tasks.transition(taskId, ['PENDING'], { state: 'SUBMITTING', updatedAt: new Date(this.clock()) });
    } catch (err) {
      await guard.release(key, taskId);
      throw err;
    }

    const outcome = await submitter.submit({
      taskId,
      netuid: req.netuid,
      hotkey: req.hotkey,
      operation: req.operation,
      amount: req.amount,
      trigger: 'direct',
      sentimentScore: null,
    });

    const txHash = outcome.status === 'confirmed' ? outcome.txHash : null;
    const error = outcome.status === 'confirmed' ? null : outcome.error;
    const code: OutcomeCode =
      outcome.status === 'confirmed' ? 'SUBMITTED'
        : outcome.status === 'failed' ? 'SUBMISSION_FAILED'
          : 'SUBMISSION_UNKNOWN';

    // terminal write first; if it throws the lock is left to expire
    await tasks.transition(taskId, ['SUBMITTING'], {
      state: outcome.status === 'confirmed' ? 'CONFIRMED' : 'FAILED',
      outcome: code,
      txHash,
      error,
      updatedAt: new Date(this.clock()),
    });
    try {
      await guard.release(key, taskId);
    } catch (err) {
      logger.error({ taskId, err: errorMessage(err) }, 'Trade lock release failed, lock will expire');
    }

    logger.info({ taskId, key, operation: req.operation, amount: req.amount, outcome: code }, 'Direct trade finished');

    return {
      task_id: taskId,
      hotkey: req.hotkey,
      netuid: req.netuid,
      amount: req.amount,
      operation_type: req.operation,
      tx_hash: txHash,
      success: outcome.status === 'confirmed',
      error,
    };
  }
}

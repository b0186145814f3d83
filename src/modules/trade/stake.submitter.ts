/**
 * Stake submission with its transaction record.
 *
 * The `submitted` row is written before the chain call and settled once
 * afterwards. Only "gateway unavailable" failures are retried: a timeout
 * may mean the operation was broadcast, so it is reported as unknown and
 * never resubmitted.
 */

import { withRetry, withTimeout } from '../../common/async.js';
import { TimeoutError, UpstreamUnavailableError, errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import type { ChainClient, StakeOperationType, SubmitStakeResult } from '../chain/chain.contracts.js';
import type { StakeTransactionRepository, TradeTrigger } from '../history/history.contracts.js';

export interface StakeRequest {
  taskId: string;
  netuid: number;
  hotkey: string;
  operation: StakeOperationType;
  amount: number;
  trigger: TradeTrigger;
  sentimentScore: number | null;
}

export type SubmissionOutcome =
  | { status: 'confirmed'; txHash: string; finalized: boolean }
  | { status: 'failed'; error: string }
  | { status: 'unknown'; error: string };

export interface StakeSubmitterDeps {
  chain: ChainClient;
  transactions: StakeTransactionRepository;
  logger: Logger;
  retryAttempts: number;
  retryBaseDelayMs: number;
  chainTimeoutMs: number;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class StakeSubmitter {
  private clock: () => number;

  constructor(private readonly deps: StakeSubmitterDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  /**
   * @param deadlineAt epoch ms after which no further attempt is started
   */
  async submit(req: StakeRequest, deadlineAt: number | null = null): Promise<SubmissionOutcome> {
    const { deps } = this;

    try {
      await deps.transactions.insertSubmitted({
        taskId: req.taskId,
        netuid: req.netuid,
        hotkey: req.hotkey,
        operationType: req.operation,
        amount: req.amount,
        sentimentScore: req.sentimentScore,
        trigger: req.trigger,
        createdAt: new Date(this.clock()),
      });
    } catch (err) {
      // nothing reached the chain yet
      deps.logger.error({ taskId: req.taskId, err: errorMessage(err) }, 'Could not record stake transaction');
      return { status: 'failed', error: `Could not record transaction: ${errorMessage(err)}` };
    }

    const remaining = (): number =>
      deadlineAt === null ? Number.POSITIVE_INFINITY : deadlineAt - this.clock();

    let result: SubmitStakeResult;
    try {
      result = await withRetry(
        () => withTimeout(
          deps.chain.submit({
            netuid: req.netuid,
            hotkey: req.hotkey,
            operation: req.operation,
            amount: req.amount,
          }),
          Math.max(1, Math.min(deps.chainTimeoutMs, remaining())),
          `Chain ${req.operation}`,
        ),
        {
          attempts: deps.retryAttempts,
          baseDelayMs: deps.retryBaseDelayMs,
          isRetriable: (err) => err instanceof UpstreamUnavailableError && remaining() > 0,
          onRetry: (err, attempt, delayMs) =>
            deps.logger.warn({ taskId: req.taskId, attempt, delayMs, err: errorMessage(err) }, 'Retrying stake submission'),
          sleep: deps.sleep,
        },
      );
    } catch (err) {
      const message = errorMessage(err);

      if (err instanceof TimeoutError) {
        // row stays `submitted` without a hash for reconciliation
        deps.logger.error({ taskId: req.taskId, err: message }, 'Stake submission outcome unknown');
        return { status: 'unknown', error: message };
      }

      await deps.transactions.settle(req.taskId, {
        status: 'failed',
        txHash: null,
        error: message,
        at: new Date(this.clock()),
      });

      deps.logger.error({ taskId: req.taskId, err: message }, 'Stake submission failed');
      return { status: 'failed', error: message };
    }

    // settlement errors propagate to the caller
    await deps.transactions.settle(req.taskId, {
      status: result.finalized ? 'confirmed' : 'submitted',
      txHash: result.txHash,
      error: null,
      at: new Date(this.clock()),
    });

    deps.logger.info(
      { taskId: req.taskId, operation: req.operation, amount: req.amount, txHash: result.txHash },
      'Stake operation submitted',
    );
    return { status: 'confirmed', txHash: result.txHash, finalized: result.finalized };
  }
}

/**
 * QUERY DISPATCHER
 * ================
 *
 * Answers dividend queries from the cache and, when asked, starts a
 * sentiment-driven trade for the account. Starting a trade never waits
 * for it: the response always carries `tx_hash: null`.
 *
 * Trade trigger: lock on behalf of a fresh task id → PENDING task → job.
 * A denied lock means a trade is already in flight (not an error).
 */

import { v4 as uuidv4 } from 'uuid';
import { ValidationError, errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import type { ChainClient } from '../chain/chain.contracts.js';
import type { TaskQueue } from '../queue/queue.contracts.js';
import type { IdempotencyGuard } from '../trade/idempotency.guard.js';
import type { TradeTaskRepository } from '../trade/trade.contracts.js';
import type { DividendCache } from './dividend.cache.js';
import {
  NetuidSchema,
  parseDividendQuery,
  tradeKey,
  type DividendBatchResult,
  type DividendQuery,
  type DividendResult,
} from './dividend.contracts.js';

export interface DividendDispatcherDeps {
  cache: Pick<DividendCache, 'getOrFetch'>;
  chain: Pick<ChainClient, 'listHotkeys'>;
  guard: IdempotencyGuard;
  tasks: TradeTaskRepository;
  queue: TaskQueue;
  logger: Logger;
  clock?: () => number;
  newTaskId?: () => string;
}

export class DividendDispatcher {
  private clock: () => number;
  private newTaskId: () => string;

  constructor(private readonly deps: DividendDispatcherDeps) {
    this.clock = deps.clock ?? Date.now;
    this.newTaskId = deps.newTaskId ?? uuidv4;
  }

  async handle(query: DividendQuery, tradeRequested: boolean): Promise<DividendResult> {
    const valid = parseDividendQuery(query);

    const { value, wasCached } = await this.deps.cache.getOrFetch(valid);
    const triggered = tradeRequested ? await this.triggerTrade(valid) : false;

    return toResult(valid, value, wasCached, triggered);
  }

  /**
   * Resolves every dividend before starting any trade: a failed fetch fails
   * the whole batch with no lock, task or job left behind.
   */
  async handleBatch(queries: DividendQuery[], tradeRequested: boolean): Promise<DividendBatchResult> {
    const valid = queries.map(parseDividendQuery);
    const values = await Promise.all(valid.map((q) => this.deps.cache.getOrFetch(q)));
    const triggered = await Promise.all(
      valid.map((q) => (tradeRequested ? this.triggerTrade(q) : Promise.resolve(false))),
    );

    const dividends = valid.map((q, i) => toResult(q, values[i].value, values[i].wasCached, triggered[i]));
    return {
      dividends,
      cached: dividends.length > 0 && dividends.every((d) => d.cached),
      stake_tx_triggered: dividends.some((d) => d.stake_tx_triggered),
    };
  }

  /** Every hotkey registered on the subnet. */
  async handleSubnet(netuid: number, tradeRequested: boolean): Promise<DividendBatchResult> {
    const parsed = NetuidSchema.safeParse(netuid);
    if (!parsed.success) {
      throw new ValidationError('netuid must be an integer between 0 and 65535');
    }
    const hotkeys = await this.deps.chain.listHotkeys(parsed.data);
    return this.handleBatch(hotkeys.map((hotkey) => ({ netuid: parsed.data, hotkey })), tradeRequested);
  }

  private async triggerTrade(query: DividendQuery): Promise<boolean> {
    const { guard, tasks, queue, logger } = this.deps;
    const key = tradeKey(query);
    const taskId = this.newTaskId();

    if (!(await guard.tryAcquire(key, taskId))) {
      logger.info({ key }, 'Trade already in flight, not triggering');
      return false;
    }

    let created = false;
    try {
      await tasks.create({
        taskId,
        kind: 'sentiment_trade',
        netuid: query.netuid,
        hotkey: query.hotkey,
        requestedAt: new Date(this.clock()),
      });
      created = true;
      await queue.enqueue({ kind: 'sentiment_trade', taskId, netuid: query.netuid, hotkey: query.hotkey }, this.clock());
    } catch (err) {
      await this.abandon(key, taskId, created, err);
      throw err;
    }

    logger.info({ key, taskId }, 'Sentiment trade enqueued');
    return true;
  }

  private async abandon(key: string, taskId: string, created: boolean, cause: unknown): Promise<void> {
    const { guard, tasks, logger } = this.deps;
    logger.error({ key, taskId, err: errorMessage(cause) }, 'Could not start trade task');

    try {
      if (created) {
        await tasks.transition(taskId, ['PENDING'], {
          state: 'FAILED',
          outcome: 'ENQUEUE_FAILED',
          error: errorMessage(cause),
          updatedAt: new Date(this.clock()),
        });
      }
      await guard.release(key, taskId);
    } catch (err) {
      logger.error({ key, taskId, err: errorMessage(err) }, 'Cleanup after failed trade start failed, lock will expire');
    }
  }
}

function toResult(query: DividendQuery, dividend: bigint, cached: boolean, triggered: boolean): DividendResult {
  return {
    netuid: query.netuid,
    hotkey: query.hotkey,
    dividend,
    cached,
    stake_tx_triggered: triggered,
    tx_hash: null,
  };
}

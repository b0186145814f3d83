/**
 * Dividend query dispatch + sentiment trade trigger
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { UpstreamUnavailableError, ValidationError } from '../../../common/errors.js';
import { MemoryCacheStore } from '../../cache/memory.cache.store.js';
import { MockChainClient } from '../../chain/chain.mock.client.js';
import { MemoryDividendHistoryRepository } from '../../history/memory.history.repository.js';
import { MemoryLockStore } from '../../locks/memory.lock.store.js';
import { MemoryTaskQueue } from '../../queue/memory.task.queue.js';
import { IdempotencyGuard } from '../../trade/idempotency.guard.js';
import { MemoryTradeTaskRepository } from '../../trade/memory.trade.repository.js';
import { DividendCache } from '../dividend.cache.js';
import { DividendDispatcher } from '../dividend.dispatcher.js';

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

const NOW = 1_700_000_000_000;

describe('DividendDispatcher', () => {
  let chain: MockChainClient;
  let tasks: MemoryTradeTaskRepository;
  let queue: MemoryTaskQueue;
  let guard: IdempotencyGuard;
  let dispatcher: DividendDispatcher;
  let ids: number;

  beforeEach(() => {
    vi.clearAllMocks();
    ids = 0;
    chain = new MockChainClient();
    vi.spyOn(chain, 'getDividend').mockResolvedValue(123456789n);
    tasks = new MemoryTradeTaskRepository();
    queue = new MemoryTaskQueue();
    guard = new IdempotencyGuard(new MemoryLockStore(), 300, mockLogger, () => NOW);

    const cache = new DividendCache({
      store: new MemoryCacheStore(),
      chain,
      history: new MemoryDividendHistoryRepository(),
      logger: mockLogger,
      config: { ttlSeconds: 120, chainTimeoutMs: 1_000, attempts: 1, retryBaseDelayMs: 1 },
      clock: () => NOW,
    });

    dispatcher = new DividendDispatcher({
      cache,
      chain,
      guard,
      tasks,
      queue,
      logger: mockLogger,
      clock: () => NOW,
      newTaskId: () => `task-${++ids}`,
    });
  });

  it('should answer a first query from the chain and start a trade', async () => {
    const result = await dispatcher.handle({ netuid: 18, hotkey: 'H1' }, true);

    expect(result).toEqual({
      netuid: 18,
      hotkey: 'H1',
      dividend: 123456789n,
      cached: false,
      stake_tx_triggered: true,
      tx_hash: null,
    });

    const task = await tasks.get('task-1');
    expect(task?.state).toBe('PENDING');
    expect(task?.kind).toBe('sentiment_trade');
    expect((await guard.status('18:H1'))?.holderTaskId).toBe('task-1');

    const claimed = await queue.claim('w1', 1_000, NOW);
    expect(claimed?.job).toEqual({ kind: 'sentiment_trade', taskId: 'task-1', netuid: 18, hotkey: 'H1' });
  });

  it('should serve a repeat query from cache without a second trade while one is in flight', async () => {
    await dispatcher.handle({ netuid: 18, hotkey: 'H1' }, true);
    const repeat = await dispatcher.handle({ netuid: 18, hotkey: 'H1' }, true);

    expect(repeat.cached).toBe(true);
    expect(repeat.stake_tx_triggered).toBe(false);
    expect(await tasks.get('task-2')).toBeNull();
    expect(await queue.stats()).toEqual({ queued: 1, running: 0, done: 0, dead: 0 });
  });

  it('should not touch the guard when no trade is requested', async () => {
    const result = await dispatcher.handle({ netuid: 18, hotkey: 'H1' }, false);

    expect(result.stake_tx_triggered).toBe(false);
    expect(await guard.status('18:H1')).toBeNull();
    expect(await queue.stats()).toEqual({ queued: 0, running: 0, done: 0, dead: 0 });
  });

  it('should reject an invalid query before any side effect', async () => {
    await expect(dispatcher.handle({ netuid: 70000, hotkey: 'H1' }, true)).rejects.toBeInstanceOf(ValidationError);
    await expect(dispatcher.handle({ netuid: 18, hotkey: 'not-base58!' }, true)).rejects.toBeInstanceOf(ValidationError);

    expect(chain.getDividend).not.toHaveBeenCalled();
    expect(await queue.stats()).toEqual({ queued: 0, running: 0, done: 0, dead: 0 });
  });

  it('should validate the whole batch before reading any dividend', async () => {
    const batch = [{ netuid: 18, hotkey: 'H1' }, { netuid: -1, hotkey: 'H2' }];

    await expect(dispatcher.handleBatch(batch, false)).rejects.toBeInstanceOf(ValidationError);
    expect(chain.getDividend).not.toHaveBeenCalled();
  });

  it('should aggregate cached and triggered flags over a batch', async () => {
    await dispatcher.handle({ netuid: 18, hotkey: 'H1' }, false);

    const result = await dispatcher.handleBatch(
      [{ netuid: 18, hotkey: 'H1' }, { netuid: 18, hotkey: 'H2' }],
      true,
    );

    expect(result.dividends.map((d) => d.cached)).toEqual([true, false]);
    expect(result.cached).toBe(false);
    expect(result.stake_tx_triggered).toBe(true);
  });

  it('should report an empty batch as not cached', async () => {
    expect(await dispatcher.handleBatch([], true)).toEqual({
      dividends: [],
      cached: false,
      stake_tx_triggered: false,
    });
  });

  it('should query every hotkey of a subnet', async () => {
    const result = await dispatcher.handleSubnet(7, false);

    expect(result.dividends.map((d) => d.hotkey)).toEqual([
      '5Mock7Hotkey1',
      '5Mock7Hotkey2',
      '5Mock7Hotkey3',
      '5Mock7Hotkey4',
    ]);
  });

  it('should start no trade when any dividend of a subnet cannot be read', async () => {
    vi.spyOn(chain, 'getDividend').mockImplementation(async (_netuid, hotkey) => {
      if (hotkey === '5Mock7Hotkey4') throw new UpstreamUnavailableError('chain down');
      return 1n;
    });

    await expect(dispatcher.handleSubnet(7, true)).rejects.toBeInstanceOf(UpstreamUnavailableError);

    expect(await tasks.get('task-1')).toBeNull();
    expect(await guard.status('7:5Mock7Hotkey1')).toBeNull();
    expect(await queue.stats()).toEqual({ queued: 0, running: 0, done: 0, dead: 0 });
  });

  it('should start a trade for every entry of a batch that resolved', async () => {
    const result = await dispatcher.handleSubnet(7, true);

    expect(result.dividends.every((d) => d.stake_tx_triggered)).toBe(true);
    expect(await queue.stats()).toEqual({ queued: 4, running: 0, done: 0, dead: 0 });
  });

  it('should fail the task and free the lock when the job cannot be enqueued', async () => {
    vi.spyOn(queue, 'enqueue').mockRejectedValue(new Error('queue down'));

    await expect(dispatcher.handle({ netuid: 18, hotkey: 'H1' }, true)).rejects.toThrow('queue down');

    const task = await tasks.get('task-1');
    expect(task?.state).toBe('FAILED');
    expect(task?.outcome).toBe('ENQUEUE_FAILED');
    expect(task?.error).toBe('queue down');
    expect(await guard.status('18:H1')).toBeNull();
  });
});

/**
 * Stale task reconciliation
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MemoryTradeTaskRepository } from '../memory.trade.repository.js';
import { TradeReconciler } from '../trade.reconciler.js';

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

describe('TradeReconciler', () => {
  let tasks: MemoryTradeTaskRepository;

  const create = (taskId: string, at: number) =>
    tasks.create({ taskId, kind: 'sentiment_trade', netuid: 18, hotkey: 'H1', requestedAt: new Date(at) });

  beforeEach(() => {
    vi.clearAllMocks();
    tasks = new MemoryTradeTaskRepository();
  });

  it('should fail only non-terminal tasks untouched for longer than the threshold', async () => {
    await create('stale', 0);
    await create('fresh', 250_000);
    await create('done', 0);
    await tasks.transition('done', ['PENDING'], { state: 'FAILED', outcome: 'NO_DATA', updatedAt: new Date(0) });

    const reconciler = new TradeReconciler({ tasks, logger: mockLogger, staleAfterMs: 300_000, clock: () => 400_000 });
    const result = await reconciler.reconcile();

    expect(result).toEqual({ checked: 1, failed: 1 });
    expect(await tasks.get('stale')).toMatchObject({
      state: 'FAILED',
      outcome: 'TASK_TIMEOUT',
      error: 'Task stalled in PENDING',
    });
    expect((await tasks.get('fresh'))?.state).toBe('PENDING');
    expect((await tasks.get('done'))?.outcome).toBe('NO_DATA');
  });

  it('should flag a task stalled while submitting as unknown outcome', async () => {
    await create('stuck', 0);
    await tasks.transition('stuck', ['PENDING'], { state: 'SUBMITTING', updatedAt: new Date(0) });

    const reconciler = new TradeReconciler({ tasks, logger: mockLogger, staleAfterMs: 1_000, clock: () => 5_000 });
    await reconciler.reconcile();

    expect((await tasks.get('stuck'))?.error).toBe('Task stalled while submitting; submission outcome unknown');
  });

  it('should respect the batch size', async () => {
    await create('a', 0);
    await create('b', 1);
    await create('c', 2);

    const reconciler = new TradeReconciler({ tasks, logger: mockLogger, staleAfterMs: 10, batchSize: 2, clock: () => 1_000 });

    expect(await reconciler.reconcile()).toEqual({ checked: 2, failed: 2 });
    expect((await tasks.get('c'))?.state).toBe('PENDING');
  });
});

/**
 * Task state table + trade decision policy
 */

import { describe, it, expect } from 'vitest';
import { MemoryTradeTaskRepository } from '../memory.trade.repository.js';
import { decideTrade, directionFor } from '../trade.policy.js';
import { ACTIVE_STATES } from '../trade.contracts.js';
import { InvalidTransitionError, canTransition } from '../trade.state.js';

describe('trade state table', () => {
  it('should allow the main flow', () => {
    expect(canTransition('PENDING', 'SCORING')).toBe(true);
    expect(canTransition('SCORING', 'DECIDING')).toBe(true);
    expect(canTransition('DECIDING', 'SUBMITTING')).toBe(true);
    expect(canTransition('SUBMITTING', 'CONFIRMED')).toBe(true);
  });

  it('should never leave a terminal state', () => {
    expect(canTransition('CONFIRMED', 'FAILED')).toBe(false);
    expect(canTransition('FAILED', 'PENDING')).toBe(false);
  });

  it('should never go back to scoring once submitting', () => {
    expect(canTransition('SUBMITTING', 'SCORING')).toBe(false);
    expect(canTransition('SUBMITTING', 'DECIDING')).toBe(false);
  });

  it('should let every non-terminal state fail', () => {
    for (const state of ACTIVE_STATES) {
      expect(canTransition(state, 'FAILED')).toBe(true);
    }
  });

  it('should reject a conditional write along an edge that does not exist', async () => {
    const tasks = new MemoryTradeTaskRepository();
    await tasks.create({ taskId: 't1', kind: 'sentiment_trade', netuid: 1, hotkey: 'H1', requestedAt: new Date(0) });

    await expect(
      tasks.transition('t1', ['PENDING'], { state: 'CONFIRMED', updatedAt: new Date(1) }),
    ).rejects.toBeInstanceOf(InvalidTransitionError);
  });

  it('should return null when the task has already moved on', async () => {
    const tasks = new MemoryTradeTaskRepository();
    await tasks.create({ taskId: 't1', kind: 'sentiment_trade', netuid: 1, hotkey: 'H1', requestedAt: new Date(0) });
    await tasks.transition('t1', ['PENDING'], { state: 'SCORING', updatedAt: new Date(1) });

    expect(await tasks.transition('t1', ['PENDING'], { state: 'FAILED', updatedAt: new Date(2) })).toBeNull();
    expect((await tasks.get('t1'))?.state).toBe('SCORING');
  });
});

describe('trade policy', () => {
  const policy = { unitAmount: 1, maxAmount: 10 };

  it('should map the score sign to a direction', () => {
    expect(directionFor(0.2)).toBe('stake');
    expect(directionFor(-0.2)).toBe('unstake');
    expect(directionFor(0)).toBe('none');
  });

  it('should size the trade by |score|', () => {
    expect(decideTrade(-0.6, policy)).toEqual({ direction: 'unstake', amount: 0.6 });
    expect(decideTrade(0.35, { unitAmount: 2, maxAmount: 10 })).toEqual({ direction: 'stake', amount: 0.7 });
  });

  it('should cap the amount', () => {
    expect(decideTrade(1, { unitAmount: 5, maxAmount: 3 })).toEqual({ direction: 'stake', amount: 3 });
  });

  it('should not trade on neutral sentiment', () => {
    expect(decideTrade(0, policy)).toEqual({ direction: 'none', amount: 0 });
  });
});

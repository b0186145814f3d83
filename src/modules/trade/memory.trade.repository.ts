/**
 * In-memory trade task repository (STORAGE_DRIVER=memory, tests).
 */

import { PersistenceError } from '../../common/errors.js';
import {
  ACTIVE_STATES,
  type NewTradeTask,
  type TaskState,
  type TradeTask,
  type TradeTaskFilter,
  type TradeTaskPatch,
  type TradeTaskRepository,
} from './trade.contracts.js';
import { assertTransitions } from './trade.state.js';

export class MemoryTradeTaskRepository implements TradeTaskRepository {
  private tasks = new Map<string, { seq: number; task: TradeTask }>();
  private seq = 0;

  async create(input: NewTradeTask): Promise<TradeTask> {
    if (this.tasks.has(input.taskId)) {
      throw new PersistenceError(`Task ${input.taskId} already exists`);
    }
    const task: TradeTask = {
      taskId: input.taskId,
      kind: input.kind,
      netuid: input.netuid,
      hotkey: input.hotkey,
      requestedAt: input.requestedAt,
      state: 'PENDING',
      sentimentScore: null,
      direction: input.direction ?? 'none',
      amount: input.amount ?? 0,
      txHash: null,
      error: null,
      outcome: null,
      attempts: 0,
      updatedAt: input.requestedAt,
    };
    this.tasks.set(task.taskId, { seq: ++this.seq, task });
    return { ...task };
  }

  async get(taskId: string): Promise<TradeTask | null> {
    const entry = this.tasks.get(taskId);
    return entry ? { ...entry.task } : null;
  }

  async transition(taskId: string, from: readonly TaskState[], patch: TradeTaskPatch): Promise<TradeTask | null> {
    assertTransitions(from, patch.state);

    const entry = this.tasks.get(taskId);
    if (!entry || !from.includes(entry.task.state)) return null;

    entry.task = { ...entry.task, ...patch };
    return { ...entry.task };
  }

  async list(filter: TradeTaskFilter): Promise<TradeTask[]> {
    return [...this.tasks.values()]
      .filter(({ task }) =>
        (filter.netuid === undefined || task.netuid === filter.netuid) &&
        (filter.hotkey === undefined || task.hotkey === filter.hotkey) &&
        (filter.state === undefined || task.state === filter.state),
      )
      .sort((a, b) => b.task.requestedAt.getTime() - a.task.requestedAt.getTime() || b.seq - a.seq)
      .slice(filter.offset, filter.offset + filter.limit)
      .map(({ task }) => ({ ...task }));
  }

  async listStale(olderThan: Date, limit: number): Promise<TradeTask[]> {
    return [...this.tasks.values()]
      .filter(({ task }) => ACTIVE_STATES.includes(task.state) && task.updatedAt < olderThan)
      .sort((a, b) => a.task.updatedAt.getTime() - b.task.updatedAt.getTime())
      .slice(0, limit)
      .map(({ task }) => ({ ...task }));
  }
}

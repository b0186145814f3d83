/**
 * MongoDB trade task repository.
 *
 * `transition` is one findOneAndUpdate filtered on the expected current
 * states, so a terminal task can never be overwritten.
 */

import type { FilterQuery } from 'mongoose';
import { PersistenceError } from '../../common/errors.js';
import { isDuplicateKeyError } from '../../db/mongoose.js';
import {
  ACTIVE_STATES,
  type NewTradeTask,
  type TaskState,
  type TradeTask,
  type TradeTaskFilter,
  type TradeTaskPatch,
  type TradeTaskRepository,
} from './trade.contracts.js';
import { type ITradeTaskDoc, TradeTaskModel } from './trade.models.js';
import { assertTransitions } from './trade.state.js';

function toTask(doc: ITradeTaskDoc): TradeTask {
  return {
    taskId: doc._id,
    kind: doc.kind,
    netuid: doc.netuid,
    hotkey: doc.hotkey,
    requestedAt: doc.requestedAt,
    state: doc.state,
    sentimentScore: doc.sentimentScore,
    direction: doc.direction,
    amount: doc.amount,
    txHash: doc.txHash,
    error: doc.error,
    outcome: doc.outcome,
    attempts: doc.attempts,
    updatedAt: doc.updatedAt,
  };
}

export class MongoTradeTaskRepository implements TradeTaskRepository {
  async create(input: NewTradeTask): Promise<TradeTask> {
    try {
      const doc = await TradeTaskModel.create({
        _id: input.taskId,
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
      });
      return toTask(doc.toObject());
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new PersistenceError(`Task ${input.taskId} already exists`);
      }
      throw err;
    }
  }

  async get(taskId: string): Promise<TradeTask | null> {
    const doc = await TradeTaskModel.findById(taskId).lean();
    return doc ? toTask(doc) : null;
  }

  async transition(taskId: string, from: readonly TaskState[], patch: TradeTaskPatch): Promise<TradeTask | null> {
    assertTransitions(from, patch.state);

    const doc = await TradeTaskModel.findOneAndUpdate(
      { _id: taskId, state: { $in: [...from] } },
      { $set: patch },
      { new: true },
    ).lean();

    return doc ? toTask(doc) : null;
  }

  async list(filter: TradeTaskFilter): Promise<TradeTask[]> {
    const query: FilterQuery<ITradeTaskDoc> = {};
    if (filter.netuid !== undefined) query.netuid = filter.netuid;
    if (filter.hotkey !== undefined) query.hotkey = filter.hotkey;
    if (filter.state !== undefined) query.state = filter.state;

    const docs = await TradeTaskModel.find(query)
      .sort({ requestedAt: -1, _id: -1 })
      .skip(filter.offset)
      .limit(filter.limit)
      .lean();

    return docs.map(toTask);
  }

  async listStale(olderThan: Date, limit: number): Promise<TradeTask[]> {
    const docs = await TradeTaskModel.find({
      state: { $in: [...ACTIVE_STATES] },
      updatedAt: { $lt: olderThan },
    })
      .sort({ updatedAt: 1 })
      .limit(limit)
      .lean();

    return docs.map(toTask);
  }
}

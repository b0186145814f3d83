/**
 * MongoDB task queue.
 *
 * Claim is a single findOneAndUpdate over "queued and available" or
 * "running with a lapsed lease", so two workers never hold the same lease.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  MAX_DELIVERIES,
  type ClaimedJob,
  type QueueStats,
  type TaskQueue,
  type TradeJob,
} from './queue.contracts.js';
import { TradeJobModel } from './queue.models.js';

export class MongoTaskQueue implements TaskQueue {
  async enqueue(job: TradeJob, now: number): Promise<string> {
    const jobId = uuidv4();
    await TradeJobModel.create({
      _id: jobId,
      kind: job.kind,
      taskId: job.taskId,
      netuid: job.netuid,
      hotkey: job.hotkey,
      status: 'queued',
      deliveries: 0,
      availableAt: new Date(now),
      leaseOwner: null,
      leaseUntil: null,
    });
    return jobId;
  }

  async claim(owner: string, leaseMs: number, now: number): Promise<ClaimedJob | null> {
    const at = new Date(now);
    const doc = await TradeJobModel.findOneAndUpdate(
      {
        $or: [
          { status: 'queued', availableAt: { $lte: at } },
          { status: 'running', leaseUntil: { $lte: at } },
        ],
      },
      {
        $set: { status: 'running', leaseOwner: owner, leaseUntil: new Date(now + leaseMs) },
        $inc: { deliveries: 1 },
      },
      { sort: { availableAt: 1, _id: 1 }, new: true },
    ).lean();

    if (!doc || !doc.leaseUntil) return null;

    return {
      jobId: doc._id,
      job: { kind: doc.kind, taskId: doc.taskId, netuid: doc.netuid, hotkey: doc.hotkey },
      deliveries: doc.deliveries,
      leaseOwner: owner,
      leaseUntil: doc.leaseUntil.getTime(),
    };
  }

  async ack(jobId: string, owner: string): Promise<boolean> {
    const res = await TradeJobModel.updateOne(
      { _id: jobId, status: 'running', leaseOwner: owner },
      { $set: { status: 'done', leaseOwner: null, leaseUntil: null } },
    );
    return res.modifiedCount > 0;
  }

  async release(jobId: string, owner: string, now: number): Promise<boolean> {
    const filter = { _id: jobId, status: 'running', leaseOwner: owner };
    const reset = { leaseOwner: null, leaseUntil: null, availableAt: new Date(now) };

    const dead = await TradeJobModel.updateOne(
      { ...filter, deliveries: { $gte: MAX_DELIVERIES } },
      { $set: { ...reset, status: 'dead' } },
    );
    if (dead.modifiedCount > 0) return true;

    const requeued = await TradeJobModel.updateOne(
      filter,
      { $set: { ...reset, status: 'queued' } },
    );
    return requeued.modifiedCount > 0;
  }

  async stats(): Promise<QueueStats> {
    const rows = await TradeJobModel.aggregate<{ _id: keyof QueueStats; count: number }>([
      { $group: { _id: '$status', count: { $sum: 1 } } },
    ]);

    const stats: QueueStats = { queued: 0, running: 0, done: 0, dead: 0 };
    for (const row of rows) stats[row._id] = row.count;
    return stats;
  }
}

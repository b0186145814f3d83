/**
 * In-process task queue (STORAGE_DRIVER=memory, tests).
 * Same lease semantics as the Mongo queue, scoped to one process.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  MAX_DELIVERIES,
  type ClaimedJob,
  type QueueJobStatus,
  type QueueStats,
  type TaskQueue,
  type TradeJob,
} from './queue.contracts.js';

interface Entry {
  jobId: string;
  job: TradeJob;
  status: QueueJobStatus;
  deliveries: number;
  availableAt: number;
  leaseOwner: string | null;
  leaseUntil: number | null;
}

export class MemoryTaskQueue implements TaskQueue {
  private entries: Entry[] = [];
  private acked = 0;

  async enqueue(job: TradeJob, now: number): Promise<string> {
    const jobId = uuidv4();
    this.entries.push({
      jobId,
      job: { ...job },
      status: 'queued',
      deliveries: 0,
      availableAt: now,
      leaseOwner: null,
      leaseUntil: null,
    });
    return jobId;
  }

  async claim(owner: string, leaseMs: number, now: number): Promise<ClaimedJob | null> {
    const entry = this.entries.find((e) =>
      (e.status === 'queued' && e.availableAt <= now) ||
      (e.status === 'running' && e.leaseUntil !== null && e.leaseUntil <= now),
    );
    if (!entry) return null;

    entry.status = 'running';
    entry.deliveries += 1;
    entry.leaseOwner = owner;
    entry.leaseUntil = now + leaseMs;

    return {
      jobId: entry.jobId,
      job: { ...entry.job },
      deliveries: entry.deliveries,
      leaseOwner: owner,
      leaseUntil: entry.leaseUntil,
    };
  }

  async ack(jobId: string, owner: string): Promise<boolean> {
    const entry = this.leasedBy(jobId, owner);
    if (!entry) return false;
    this.entries.splice(this.entries.indexOf(entry), 1);
    this.acked++;
    return true;
  }

  async release(jobId: string, owner: string, now: number): Promise<boolean> {
    const entry = this.leasedBy(jobId, owner);
    if (!entry) return false;
    entry.status = entry.deliveries >= MAX_DELIVERIES ? 'dead' : 'queued';
    entry.availableAt = now;
    entry.leaseOwner = null;
    entry.leaseUntil = null;
    return true;
  }

  async stats(): Promise<QueueStats> {
    const stats: QueueStats = { queued: 0, running: 0, done: this.acked, dead: 0 };
    for (const e of this.entries) stats[e.status]++;
    return stats;
  }

  /** Jobs still held: queued, running or dead. */
  size(): number {
    return this.entries.length;
  }

  private leasedBy(jobId: string, owner: string): Entry | undefined {
    return this.entries.find((e) => e.jobId === jobId && e.status === 'running' && e.leaseOwner === owner);
  }
}

/**
 * Trade task state machine.
 *
 * PENDING → SCORING → DECIDING → SUBMITTING → CONFIRMED | FAILED
 *
 * Extra edges:
 * - PENDING → SUBMITTING: direct trades skip scoring
 * - SCORING/DECIDING → SCORING: a redelivered task restarts scoring
 * - any non-terminal → FAILED
 */

import type { TaskState } from './trade.contracts.js';

export const TRANSITIONS: Readonly<Record<TaskState, readonly TaskState[]>> = {
  PENDING: ['SCORING', 'SUBMITTING', 'FAILED'],
  SCORING: ['SCORING', 'DECIDING', 'FAILED'],
  DECIDING: ['SCORING', 'SUBMITTING', 'FAILED'],
  SUBMITTING: ['CONFIRMED', 'FAILED'],
  CONFIRMED: [],
  FAILED: [],
};

export class InvalidTransitionError extends Error {
  constructor(public readonly from: TaskState, public readonly to: TaskState) {
    super(`Invalid task transition ${from} → ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export function canTransition(from: TaskState, to: TaskState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: TaskState, to: TaskState): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

/** Every edge a conditional write may take must exist in the table. */
export function assertTransitions(from: readonly TaskState[], to: TaskState): void {
  for (const state of from) {
    assertTransition(state, to);
  }
}

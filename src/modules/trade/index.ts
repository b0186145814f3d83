/**
 * Trade Module
 * ============
 *
 * Guarded, sentiment-driven (async) and direct (inline) stake operations.
 */

export * from './trade.contracts.js';
export { TRANSITIONS, assertTransition, canTransition, InvalidTransitionError } from './trade.state.js';
export { decideTrade, directionFor, type TradePolicy } from './trade.policy.js';
export { IdempotencyGuard } from './idempotency.guard.js';
export { MemoryTradeTaskRepository } from './memory.trade.repository.js';
export { MongoTradeTaskRepository } from './mongo.trade.repository.js';
export { StakeSubmitter, type SubmissionOutcome } from './stake.submitter.js';
export { TradeOrchestrator, type TaskRunResult } from './trade.orchestrator.js';
export { WorkerPool, type WorkerPoolStatus } from './worker.pool.js';
export { TradeReconciler } from './trade.reconciler.js';
export { DirectTradeService, type DirectTradeResult } from './direct-trade.service.js';
export { registerTradeRoutes } from './trade.routes.js';

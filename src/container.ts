/**
 * Service wiring
 * ==============
 *
 * Builds every service from configuration. STORAGE_DRIVER picks Mongo or
 * in-process stores; CHAIN_PROVIDER picks the gateway client or the mock.
 * Tests pass overrides for collaborators, clock and sleep.
 */

import type { Logger } from './common/logger.js';
import type { Env } from './config/env.js';
import { MemoryCacheStore, MongoCacheStore, type CacheStore } from './modules/cache/index.js';
import { HttpChainClient, MockChainClient, type ChainClient } from './modules/chain/index.js';
import { DividendCache, DividendDispatcher } from './modules/dividends/index.js';
import { createMemoryHistory, createMongoHistory, type HistoryRepositories } from './modules/history/index.js';
import { MemoryLockStore, MongoLockStore, type LockStore } from './modules/locks/index.js';
import { MemoryTaskQueue, MongoTaskQueue, type TaskQueue } from './modules/queue/index.js';
import {
  LlmScoringClient,
  PostSearchClient,
  SentimentService,
  type SentimentProvider,
} from './modules/sentiment/index.js';
import {
  DirectTradeService,
  IdempotencyGuard,
  MemoryTradeTaskRepository,
  MongoTradeTaskRepository,
  StakeSubmitter,
  TradeOrchestrator,
  TradeReconciler,
  WorkerPool,
  type TradeTaskRepository,
} from './modules/trade/index.js';

export interface Container {
  env: Env;
  logger: Logger;
  store: CacheStore;
  locks: LockStore;
  queue: TaskQueue;
  history: HistoryRepositories;
  tasks: TradeTaskRepository;
  chain: ChainClient;
  sentiment: SentimentProvider;
  guard: IdempotencyGuard;
  dividendCache: DividendCache;
  dispatcher: DividendDispatcher;
  submitter: StakeSubmitter;
  orchestrator: TradeOrchestrator;
  directTrade: DirectTradeService;
  reconciler: TradeReconciler;
  workers: WorkerPool;
}

export interface ContainerOverrides {
  chain?: ChainClient;
  sentiment?: SentimentProvider;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
  newTaskId?: () => string;
}

export function createContainer(env: Env, logger: Logger, overrides: ContainerOverrides = {}): Container {
  const { clock, sleep, newTaskId } = overrides;
  const memory = env.STORAGE_DRIVER === 'memory';

  // ── storage ──
  const store: CacheStore = memory ? new MemoryCacheStore() : new MongoCacheStore();
  const locks: LockStore = memory ? new MemoryLockStore() : new MongoLockStore();
  const queue: TaskQueue = memory ? new MemoryTaskQueue() : new MongoTaskQueue();
  const history = memory ? createMemoryHistory() : createMongoHistory();
  const tasks: TradeTaskRepository = memory ? new MemoryTradeTaskRepository() : new MongoTradeTaskRepository();

  // ── collaborators ──
  const chain: ChainClient = overrides.chain ?? (env.CHAIN_PROVIDER === 'http'
    ? new HttpChainClient({ baseUrl: env.CHAIN_GATEWAY_URL, timeout: env.CHAIN_TIMEOUT_MS })
    : new MockChainClient());

  const sentiment: SentimentProvider = overrides.sentiment ?? new SentimentService({
    search: new PostSearchClient(
      { baseUrl: env.DATURA_BASE_URL, apiKey: env.DATURA_API_KEY, timeout: env.SENTIMENT_TIMEOUT_MS },
      logger,
    ),
    scorer: new LlmScoringClient(
      {
        baseUrl: env.CHUTES_BASE_URL,
        apiKey: env.CHUTES_API_KEY,
        model: env.CHUTES_MODEL,
        timeout: env.SENTIMENT_TIMEOUT_MS,
      },
      logger,
    ),
    analyses: history.sentiment,
    logger,
    maxPosts: env.SENTIMENT_MAX_POSTS,
    clock,
  });

  // ── services ──
  const guard = new IdempotencyGuard(locks, env.LOCK_TTL_SECONDS, logger, clock);

  const dividendCache = new DividendCache({
    store,
    chain,
    history: history.dividends,
    logger,
    config: {
      ttlSeconds: env.CACHE_TTL_SECONDS,
      chainTimeoutMs: env.CHAIN_TIMEOUT_MS,
      attempts: env.CHAIN_QUERY_ATTEMPTS,
      retryBaseDelayMs: env.RETRY_BASE_DELAY_MS,
    },
    clock,
    sleep,
  });

  const dispatcher = new DividendDispatcher({
    cache: dividendCache,
    chain,
    guard,
    tasks,
    queue,
    logger,
    clock,
    newTaskId,
  });

  const submitter = new StakeSubmitter({
    chain,
    transactions: history.transactions,
    logger,
    retryAttempts: env.RETRY_MAX_ATTEMPTS,
    retryBaseDelayMs: env.RETRY_BASE_DELAY_MS,
    chainTimeoutMs: env.CHAIN_TIMEOUT_MS,
    clock,
    sleep,
  });

  const orchestrator = new TradeOrchestrator({
    tasks,
    sentiment,
    submitter,
    guard,
    logger,
    config: {
      retryAttempts: env.RETRY_MAX_ATTEMPTS,
      retryBaseDelayMs: env.RETRY_BASE_DELAY_MS,
      sentimentTimeoutMs: env.SENTIMENT_TIMEOUT_MS,
      taskDeadlineMs: env.TASK_DEADLINE_SECONDS * 1000,
      policy: { unitAmount: env.TRADE_UNIT_AMOUNT, maxAmount: env.TRADE_MAX_AMOUNT },
    },
    clock,
    sleep,
  });

  const directTrade = new DirectTradeService({ tasks, guard, submitter, logger, clock, newTaskId });

  const reconciler = new TradeReconciler({
    tasks,
    logger,
    staleAfterMs: env.LOCK_TTL_SECONDS * 1000,
    clock,
  });

  const workers = new WorkerPool({
    queue,
    orchestrator,
    logger,
    config: {
      concurrency: env.WORKER_CONCURRENCY,
      pollMs: env.WORKER_POLL_MS,
      leaseMs: env.QUEUE_LEASE_SECONDS * 1000,
    },
    clock,
    sleep,
  });

  return {
    env,
    logger,
    store,
    locks,
    queue,
    history,
    tasks,
    chain,
    sentiment,
    guard,
    dividendCache,
    dispatcher,
    submitter,
    orchestrator,
    directTrade,
    reconciler,
    workers,
  };
}

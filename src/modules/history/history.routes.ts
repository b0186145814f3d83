/**
 * History API Routes
 * ==================
 *
 * ENDPOINTS (under the API prefix, authenticated):
 * - GET /blockchain/dividend-history
 * - GET /blockchain/stake-transaction-history
 * - GET /blockchain/sentiment-history
 *
 * All take optional `netuid`, `hotkey`, `limit` (1..1000, default 100) and
 * `offset` (default 0); transactions also `operation_type`.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { toJsonAmount } from '../../common/amounts.js';
import { HotkeySchema, NetuidSchema } from '../dividends/dividend.contracts.js';
import {
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
  type DividendRecord,
  type HistoryRepositories,
  type SentimentAnalysis,
  type StakeTransaction,
} from './history.contracts.js';

export const PageQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_LIMIT).default(DEFAULT_PAGE_LIMIT),
  offset: z.coerce.number().int().min(0).default(0),
});

const HistoryQuerySchema = PageQuerySchema.extend({
  netuid: NetuidSchema.optional(),
  hotkey: HotkeySchema.optional(),
});

const TransactionQuerySchema = HistoryQuerySchema.extend({
  operation_type: z.enum(['stake', 'unstake']).optional(),
});

// ============================================
// SERIALIZERS
// ============================================

function dividendJson(r: DividendRecord) {
  return {
    id: r.id,
    netuid: r.netuid,
    hotkey: r.hotkey,
    dividend: toJsonAmount(r.dividend),
    source: r.source,
    timestamp: r.observedAt.toISOString(),
  };
}

function transactionJson(t: StakeTransaction) {
  return {
    id: t.id,
    task_id: t.taskId,
    netuid: t.netuid,
    hotkey: t.hotkey,
    operation_type: t.operationType,
    amount: t.amount,
    tx_hash: t.txHash,
    status: t.status,
    error: t.error,
    sentiment_score: t.sentimentScore,
    trigger: t.trigger,
    created_at: t.createdAt.toISOString(),
    updated_at: t.updatedAt.toISOString(),
  };
}

function sentimentJson(s: SentimentAnalysis) {
  return {
    id: s.id,
    task_id: s.taskId,
    netuid: s.netuid,
    hotkey: s.hotkey,
    raw_score: s.rawScore,
    score: s.score,
    posts_count: s.postsCount,
    operation_type: s.direction,
    created_at: s.createdAt.toISOString(),
  };
}

// ============================================
// ROUTES
// ============================================

export async function registerHistoryRoutes(app: FastifyInstance, history: HistoryRepositories): Promise<void> {
  app.get('/blockchain/dividend-history', async (request: FastifyRequest) => {
    const q = HistoryQuerySchema.parse(request.query);
    const rows = await history.dividends.list(q);
    return rows.map(dividendJson);
  });

  app.get('/blockchain/stake-transaction-history', async (request: FastifyRequest) => {
    const q = TransactionQuerySchema.parse(request.query);
    const rows = await history.transactions.list({
      netuid: q.netuid,
      hotkey: q.hotkey,
      operationType: q.operation_type,
      limit: q.limit,
      offset: q.offset,
    });
    return rows.map(transactionJson);
  });

  app.get('/blockchain/sentiment-history', async (request: FastifyRequest) => {
    const q = HistoryQuerySchema.parse(request.query);
    const rows = await history.sentiment.list(q);
    return rows.map(sentimentJson);
  });
}

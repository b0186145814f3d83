/**
 * Trade API Routes
 * ================
 *
 * ENDPOINTS (under the API prefix, authenticated):
 * - POST /blockchain/stake     direct stake (guarded, no sentiment)
 * - POST /blockchain/unstake   direct unstake
 * - GET  /trades               trade tasks, newest first
 * - GET  /trades/:taskId       one trade task
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { roundTokenAmount } from '../../common/amounts.js';
import { NotFoundError } from '../../common/errors.js';
import type { StakeOperationType } from '../chain/chain.contracts.js';
import { HotkeySchema, NetuidSchema } from '../dividends/dividend.contracts.js';
import { PageQuerySchema } from '../history/history.routes.js';
import type { DirectTradeService } from './direct-trade.service.js';
import { toTradeTaskJson, type TradeTaskRepository } from './trade.contracts.js';

// same 9-decimal rule as sentiment-sized trades
const DirectTradeBodySchema = z.object({
  amount: z.coerce
    .number()
    .finite()
    .transform(roundTokenAmount)
    .refine((v) => v > 0, 'amount must be a positive number of at least 1e-9 tokens'),
  netuid: NetuidSchema.optional(),
  hotkey: HotkeySchema.optional(),
});

const TaskListQuerySchema = PageQuerySchema.extend({
  netuid: NetuidSchema.optional(),
  hotkey: HotkeySchema.optional(),
  state: z.enum(['PENDING', 'SCORING', 'DECIDING', 'SUBMITTING', 'CONFIRMED', 'FAILED']).optional(),
});

export interface TradeRouteDeps {
  directTrade: DirectTradeService;
  tasks: TradeTaskRepository;
  defaults: { netuid: number; hotkey: string };
}

export async function registerTradeRoutes(app: FastifyInstance, deps: TradeRouteDeps): Promise<void> {
  const { directTrade, tasks, defaults } = deps;

  const directHandler = (operation: StakeOperationType) =>
    async (request: FastifyRequest, reply: FastifyReply) => {
      const body = DirectTradeBodySchema.parse(request.body ?? {});
      const result = await directTrade.execute({
        operation,
        amount: body.amount,
        netuid: body.netuid ?? defaults.netuid,
        hotkey: body.hotkey ?? defaults.hotkey,
      });
      return reply.status(result.success ? 200 : 502).send(result);
    };

  app.post('/blockchain/stake', directHandler('stake'));
  app.post('/blockchain/unstake', directHandler('unstake'));

  app.get('/trades', async (request: FastifyRequest) => {
    const q = TaskListQuerySchema.parse(request.query);
    const rows = await tasks.list(q);
    return rows.map(toTradeTaskJson);
  });

  app.get('/trades/:taskId', async (request: FastifyRequest<{ Params: { taskId: string } }>) => {
    const task = await tasks.get(request.params.taskId);
    if (!task) {
      throw new NotFoundError(`Trade task ${request.params.taskId} not found`);
    }
    return toTradeTaskJson(task);
  });
}

/**
 * Route registration
 *
 * /health and /worker-health are public health checks; everything under the API
 * prefix requires the API token.
 */

import type { FastifyInstance } from 'fastify';
import type { Container } from '../container.js';
import { registerDividendRoutes } from '../modules/dividends/index.js';
import { registerHistoryRoutes } from '../modules/history/index.js';
import { registerTradeRoutes } from '../modules/trade/index.js';
import { apiAuthHook } from './auth.js';

export const HEALTH_PATHS = ['/health', '/worker-health'];

export async function registerRoutes(app: FastifyInstance, container: Container): Promise<void> {
  const { env } = container;
  const defaults = { netuid: env.DEFAULT_NETUID, hotkey: env.DEFAULT_HOTKEY };

  app.get('/health', async () => ({ status: 'ok' }));

  app.get('/worker-health', async () => {
    const workers = container.workers.status();
    const queue = await container.queue.stats();
    return {
      status: 'ok',
      workers_in_process: env.WORKERS_IN_PROCESS,
      worker: env.WORKERS_IN_PROCESS ? workers : null,
      queue,
      cache: container.dividendCache.stats(),
      timestamp: new Date().toISOString(),
    };
  });

  await app.register(async (api) => {
    api.addHook('preHandler', apiAuthHook(env.API_AUTH_TOKEN));

    await registerDividendRoutes(api, { dispatcher: container.dispatcher, defaults });
    await registerTradeRoutes(api, { directTrade: container.directTrade, tasks: container.tasks, defaults });
    await registerHistoryRoutes(api, container.history);
  }, { prefix: env.API_PREFIX });
}

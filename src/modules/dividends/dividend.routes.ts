/**
 * Dividend API Routes
 * ===================
 *
 * GET /tao_dividends?netuid=&hotkey=&trade=
 * - both omitted → default account
 * - netuid without hotkey → every hotkey of the subnet
 * - trade=true → also start a sentiment-driven trade (never awaited)
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { toJsonAmount } from '../../common/amounts.js';
import type { DividendDispatcher } from './dividend.dispatcher.js';
import {
  HotkeySchema,
  NetuidSchema,
  type DividendBatchResult,
  type DividendBatchResultJson,
  type DividendResult,
  type DividendResultJson,
} from './dividend.contracts.js';

const TRUTHY = ['true', '1', 'yes', 'on'] as const;
const FALSY = ['false', '0', 'no', 'off'] as const;

/** Case-insensitive boolean query flag. */
const TradeFlagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum([...TRUTHY, ...FALSY]))
  .transform((v) => TRUTHY.some((t) => t === v));

const DividendsQuerySchema = z.object({
  netuid: NetuidSchema.optional(),
  hotkey: HotkeySchema.optional(),
  trade: TradeFlagSchema.default('false'),
});

export interface DividendRouteDeps {
  dispatcher: DividendDispatcher;
  defaults: { netuid: number; hotkey: string };
}

export function toDividendJson(result: DividendResult): DividendResultJson {
  return { ...result, dividend: toJsonAmount(result.dividend) };
}

export function toBatchJson(result: DividendBatchResult): DividendBatchResultJson {
  return {
    dividends: result.dividends.map(toDividendJson),
    cached: result.cached,
    stake_tx_triggered: result.stake_tx_triggered,
  };
}

export async function registerDividendRoutes(app: FastifyInstance, deps: DividendRouteDeps): Promise<void> {
  const { dispatcher, defaults } = deps;

  app.get('/tao_dividends', async (request: FastifyRequest) => {
    const q = DividendsQuerySchema.parse(request.query);

    if (q.netuid !== undefined && q.hotkey === undefined) {
      return toBatchJson(await dispatcher.handleSubnet(q.netuid, q.trade));
    }

    const result = await dispatcher.handle(
      { netuid: q.netuid ?? defaults.netuid, hotkey: q.hotkey ?? defaults.hotkey },
      q.trade,
    );
    return toDividendJson(result);
  });
}

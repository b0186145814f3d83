/**
 * HTTP API Tests
 *
 * Full app on in-process storage with a mock chain and a stub sentiment
 * provider, driven through fastify.inject.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../app.js';
import { ExternalApiError } from '../../common/errors.js';
import { loadEnv } from '../../config/env.js';
import { createContainer, type Container } from '../../container.js';
import { MockChainClient } from '../../modules/chain/chain.mock.client.js';

const TOKEN = 'test-secret';
const AUTH = { authorization: `Bearer ${TOKEN}` };

const env = loadEnv({
  NODE_ENV: 'test',
  LOG_LEVEL: 'silent',
  API_AUTH_TOKEN: TOKEN,
  DEFAULT_HOTKEY: 'H1',
  DEFAULT_NETUID: '18',
  STORAGE_DRIVER: 'memory',
  WORKERS_IN_PROCESS: 'false',
});

describe('HTTP API', () => {
  let app: FastifyInstance;
  let container: Container;
  let chain: MockChainClient;
  let scoreFn: ReturnType<typeof vi.fn>;

  beforeEach(async () => {
    chain = new MockChainClient();
    vi.spyOn(chain, 'getDividend').mockResolvedValue(123456789n);
    scoreFn = vi.fn().mockResolvedValue({ score: -0.6, rawScore: -60, postsCount: 3 });
    let ids = 0;

    const built = buildApp(env, (logger) => createContainer(env, logger, {
      chain,
      sentiment: { score: scoreFn },
      sleep: async () => undefined,
      newTaskId: () => `task-${++ids}`,
    }));
    app = built.app;
    container = built.container;
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  // ═══════════════════════════════════════════════════════════════
  // HEALTH + AUTH
  // ═══════════════════════════════════════════════════════════════

  it('should serve /health without a token', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  it('should report queue and cache state on /worker-health', async () => {
    const res = await app.inject({ method: 'GET', url: '/worker-health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      status: 'ok',
      workers_in_process: false,
      worker: null,
      queue: { queued: 0, running: 0, done: 0, dead: 0 },
      cache: { hits: 0, misses: 0 },
    });
  });

  it('should reject API calls without a token', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/tao_dividends' });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ ok: false, error: 'AUTHENTICATION_ERROR', message: 'API key is missing' });
  });

  it('should reject a wrong token', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/api/v1/tao_dividends',
      headers: { authorization: 'Bearer wrong' },
    });

    expect(res.statusCode).toBe(401);
    expect(res.json().message).toBe('Invalid API key');
  });

  it('should accept the bare token as well as the Bearer form', async () => {
    const res = await app.inject({
      method: 'GET',
      url: '/api/v1/tao_dividends',
      headers: { authorization: TOKEN },
    });

    expect(res.statusCode).toBe(200);
  });

  it('should answer unknown routes with 404', async () => {
    const res = await app.inject({ method: 'GET', url: '/nope' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });

  // ═══════════════════════════════════════════════════════════════
  // DIVIDENDS
  // ═══════════════════════════════════════════════════════════════

  it('should return the dividend and start a trade, then serve from cache', async () => {
    const first = await app.inject({
      method: 'GET',
      url: '/api/v1/tao_dividends?netuid=18&hotkey=H1&trade=true',
      headers: AUTH,
    });

    expect(first.statusCode).toBe(200);
    expect(first.json()).toEqual({
      netuid: 18,
      hotkey: 'H1',
      dividend: 123456789,
      cached: false,
      stake_tx_triggered: true,
      tx_hash: null,
    });

    const second = await app.inject({
      method: 'GET',
      url: '/api/v1/tao_dividends?netuid=18&hotkey=H1&trade=true',
      headers: AUTH,
    });

    expect(second.json()).toMatchObject({ cached: true, stake_tx_triggered: false });
    expect(chain.getDividend).toHaveBeenCalledTimes(1);
  });

  it('should fall back to the default account', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/tao_dividends', headers: AUTH });

    expect(res.json()).toMatchObject({ netuid: 18, hotkey: 'H1', stake_tx_triggered: false });
    expect(chain.getDividend).toHaveBeenCalledWith(18, 'H1');
  });

  it('should list every hotkey when only netuid is given', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/tao_dividends?netuid=3', headers: AUTH });

    const body = res.json();
    expect(body.dividends).toHaveLength(4);
    expect(body.cached).toBe(false);
    expect(body.stake_tx_triggered).toBe(false);
  });

  it('should read the trade flag case-insensitively', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/tao_dividends?trade=True', headers: AUTH });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ hotkey: 'H1', stake_tx_triggered: true });
  });

  it('should reject a trade flag that is not a boolean', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/tao_dividends?trade=maybe', headers: AUTH });

    expect(res.statusCode).toBe(400);
    expect(chain.getDividend).not.toHaveBeenCalled();
  });

  it('should reject an invalid netuid with 400', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/tao_dividends?netuid=abc', headers: AUTH });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ ok: false, error: 'VALIDATION_ERROR' });
    expect(chain.getDividend).not.toHaveBeenCalled();
  });

  it('should answer 503 when the chain is unavailable', async () => {
    vi.spyOn(chain, 'getDividend').mockRejectedValue(new ExternalApiError('rpc down'));

    const res = await app.inject({ method: 'GET', url: '/api/v1/tao_dividends', headers: AUTH });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({
      ok: false,
      error: 'UPSTREAM_UNAVAILABLE',
      message: 'Dividend query failed: rpc down',
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // TRADES
  // ═══════════════════════════════════════════════════════════════

  it('should run a triggered trade to completion on the worker', async () => {
    await app.inject({ method: 'GET', url: '/api/v1/tao_dividends?trade=true', headers: AUTH });

    expect(await container.workers.runOnce()).toBe(true);

    const res = await app.inject({ method: 'GET', url: '/api/v1/trades/task-1', headers: AUTH });
    expect(res.json()).toMatchObject({
      task_id: 'task-1',
      state: 'CONFIRMED',
      direction: 'unstake',
      amount: 0.6,
      sentiment_score: -0.6,
      outcome: 'SUBMITTED',
    });

    const txs = await app.inject({ method: 'GET', url: '/api/v1/blockchain/stake-transaction-history', headers: AUTH });
    expect(txs.json()).toHaveLength(1);
    expect(txs.json()[0]).toMatchObject({ task_id: 'task-1', operation_type: 'unstake', status: 'confirmed' });
  });

  it('should run a direct stake and report the transaction', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/blockchain/stake',
      headers: AUTH,
      payload: { amount: 2 },
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toMatchObject({
      task_id: 'task-1',
      hotkey: 'H1',
      netuid: 18,
      amount: 2,
      operation_type: 'stake',
      success: true,
      error: null,
    });
    expect(body.tx_hash).toMatch(/^0x[0-9a-f]+$/);
  });

  it('should answer 409 while a trade is in flight for the account', async () => {
    await container.guard.tryAcquire('18:H1', 'other-task');

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/blockchain/unstake',
      headers: AUTH,
      payload: { amount: 1 },
    });

    expect(res.statusCode).toBe(409);
    expect(res.json()).toMatchObject({ ok: false, error: 'TRADE_IN_FLIGHT' });
  });

  it('should answer 502 when the chain rejects a direct trade', async () => {
    vi.spyOn(chain, 'submit').mockRejectedValue(new ExternalApiError('Chain rejected unstake: no stake'));

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/blockchain/unstake',
      headers: AUTH,
      payload: { amount: 1 },
    });

    expect(res.statusCode).toBe(502);
    expect(res.json()).toMatchObject({ success: false, tx_hash: null, error: 'Chain rejected unstake: no stake' });
  });

  it('should reject a non-positive amount', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/blockchain/stake',
      headers: AUTH,
      payload: { amount: 0 },
    });

    expect(res.statusCode).toBe(400);
  });

  it('should reject an infinite amount without submitting', async () => {
    const submit = vi.spyOn(chain, 'submit');

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/blockchain/stake',
      headers: AUTH,
      payload: { amount: 'Infinity' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ ok: false, error: 'VALIDATION_ERROR' });
    expect(submit).not.toHaveBeenCalled();
    expect(await container.guard.status('18:H1')).toBeNull();
  });

  it('should round a direct trade amount to 9 decimals', async () => {
    const submit = vi.spyOn(chain, 'submit');

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/blockchain/stake',
      headers: AUTH,
      payload: { amount: 1.23456789012 },
    });

    expect(res.json()).toMatchObject({ amount: 1.23456789, success: true });
    expect(submit.mock.calls[0][0]).toMatchObject({ amount: 1.23456789 });
  });

  it('should reject an amount that rounds to zero', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/blockchain/stake',
      headers: AUTH,
      payload: { amount: 1e-12 },
    });

    expect(res.statusCode).toBe(400);
  });

  it('should answer 404 for an unknown trade task', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/trades/missing', headers: AUTH });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Trade task missing not found' });
  });

  // ═══════════════════════════════════════════════════════════════
  // HISTORY
  // ═══════════════════════════════════════════════════════════════

  it('should list dividend observations', async () => {
    await app.inject({ method: 'GET', url: '/api/v1/tao_dividends', headers: AUTH });

    const res = await app.inject({ method: 'GET', url: '/api/v1/blockchain/dividend-history?limit=5', headers: AUTH });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual([{
      id: expect.any(String),
      netuid: 18,
      hotkey: 'H1',
      dividend: 123456789,
      source: 'chain',
      timestamp: expect.any(String),
    }]);
  });

  it('should validate the page size', async () => {
    const zero = await app.inject({ method: 'GET', url: '/api/v1/blockchain/dividend-history?limit=0', headers: AUTH });
    const tooMany = await app.inject({ method: 'GET', url: '/api/v1/blockchain/sentiment-history?limit=1001', headers: AUTH });

    expect(zero.statusCode).toBe(400);
    expect(tooMany.statusCode).toBe(400);
  });
});

/**
 * Chain gateway client + deterministic mock
 */

import { describe, it, expect } from 'vitest';
import axios, { AxiosError, type InternalAxiosRequestConfig } from 'axios';
import { ExternalApiError, TimeoutError, UpstreamUnavailableError } from '../../../common/errors.js';
import { HttpChainClient } from '../chain.http.client.js';
import { MockChainClient } from '../chain.mock.client.js';

function gateway(routes: Record<string, unknown>) {
  const seen: { method: string | undefined; url: string | undefined; body: unknown }[] = [];
  const client = axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      seen.push({
        method: config.method,
        url: config.url,
        body: typeof config.data === 'string' ? JSON.parse(config.data) : undefined,
      });
      const data = routes[config.url ?? ''];
      if (data === undefined) {
        const response = { data: {}, status: 404, statusText: 'Not Found', headers: {}, config };
        throw new AxiosError('not found', 'ERR_BAD_REQUEST', config, undefined, response);
      }
      return { data, status: 200, statusText: 'OK', headers: {}, config };
    },
  });
  return { client, seen };
}

function broken(code: string, status?: number) {
  return axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      const response = status === undefined
        ? undefined
        : { data: {}, status, statusText: '', headers: {}, config };
      throw new AxiosError('gateway error', code, config, undefined, response);
    },
  });
}

describe('HttpChainClient', () => {
  it('should read a dividend as bigint, including values beyond 2^53', async () => {
    const { client, seen } = gateway({
      '/dividends/18/H1': { dividend: '123456789' },
      '/dividends/18/H2': { dividend: '18446744073709551616' },
    });
    const chain = new HttpChainClient({}, client);

    expect(await chain.getDividend(18, 'H1')).toBe(123456789n);
    expect(await chain.getDividend(18, 'H2')).toBe(18446744073709551616n);
    expect(seen[0]).toEqual({ method: 'get', url: '/dividends/18/H1', body: undefined });
  });

  it('should list subnet hotkeys', async () => {
    const { client } = gateway({ '/subnets/3/hotkeys': { hotkeys: ['A1', 'B2'] } });

    expect(await new HttpChainClient({}, client).listHotkeys(3)).toEqual(['A1', 'B2']);
  });

  it('should post stake operations and return the transaction hash', async () => {
    const { client, seen } = gateway({ '/unstake': { success: true, tx_hash: '0xfeed', finalized: false } });
    const chain = new HttpChainClient({}, client);

    const result = await chain.submit({ netuid: 18, hotkey: 'H1', operation: 'unstake', amount: 0.6 });

    expect(result).toEqual({ txHash: '0xfeed', finalized: false });
    expect(seen[0]).toEqual({ method: 'post', url: '/unstake', body: { netuid: 18, hotkey: 'H1', amount: 0.6 } });
  });

  it('should treat a rejected transaction as a final error', async () => {
    const { client } = gateway({ '/stake': { success: false, error: 'insufficient balance' } });
    const chain = new HttpChainClient({}, client);

    const err = await chain.submit({ netuid: 18, hotkey: 'H1', operation: 'stake', amount: 1 }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExternalApiError);
    expect(err).toHaveProperty('message', 'Chain rejected stake: insufficient balance');
  });

  it('should map gateway failures onto the error taxonomy', async () => {
    await expect(new HttpChainClient({}, broken('ERR_BAD_RESPONSE', 502)).getDividend(18, 'H1'))
      .rejects.toBeInstanceOf(UpstreamUnavailableError);
    await expect(new HttpChainClient({}, broken('ECONNREFUSED')).getDividend(18, 'H1'))
      .rejects.toBeInstanceOf(UpstreamUnavailableError);
    await expect(new HttpChainClient({ timeout: 50 }, broken('ECONNABORTED')).getDividend(18, 'H1'))
      .rejects.toBeInstanceOf(TimeoutError);
    await expect(new HttpChainClient({}, broken('ERR_BAD_REQUEST', 400)).getDividend(18, 'H1'))
      .rejects.toBeInstanceOf(ExternalApiError);
  });
});

describe('MockChainClient', () => {
  it('should return the same dividend for the same account', async () => {
    const chain = new MockChainClient();

    const first = await chain.getDividend(18, 'H1');
    expect(await chain.getDividend(18, 'H1')).toBe(first);
    expect(first).toBeGreaterThanOrEqual(0n);
    expect(first).toBeLessThan(1_000_000_000n);
  });

  it('should return a distinct hash for every submission', async () => {
    const chain = new MockChainClient();
    const input = { netuid: 18, hotkey: 'H1', operation: 'stake' as const, amount: 1 };

    const a = await chain.submit(input);
    const b = await chain.submit(input);

    expect(a.txHash).toMatch(/^0x[0-9a-f]{16,}$/);
    expect(a.txHash).not.toBe(b.txHash);
    expect(a.finalized).toBe(true);
  });
});

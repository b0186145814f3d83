/**
 * Read-through dividend cache
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { UpstreamUnavailableError } from '../../../common/errors.js';
import { MemoryCacheStore } from '../../cache/memory.cache.store.js';
import type { ChainClient } from '../../chain/chain.contracts.js';
import { MemoryDividendHistoryRepository } from '../../history/memory.history.repository.js';
import { DividendCache } from '../dividend.cache.js';

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

const QUERY = { netuid: 18, hotkey: 'H1' };

function fakeChain(getDividend: ChainClient['getDividend']): ChainClient {
  return {
    name: 'fake',
    getDividend,
    listHotkeys: vi.fn().mockResolvedValue([]),
    submit: vi.fn(),
  };
}

describe('DividendCache', () => {
  let now: number;
  let store: MemoryCacheStore;
  let history: MemoryDividendHistoryRepository;

  const build = (chain: ChainClient, attempts = 3) => new DividendCache({
    store,
    chain,
    history,
    logger: mockLogger,
    config: { ttlSeconds: 120, chainTimeoutMs: 1_000, attempts, retryBaseDelayMs: 10 },
    clock: () => now,
    sleep: async () => undefined,
  });

  beforeEach(() => {
    vi.clearAllMocks();
    now = 1_700_000_000_000;
    store = new MemoryCacheStore();
    history = new MemoryDividendHistoryRepository();
  });

  it('should fetch on a miss and serve the next read from cache', async () => {
    const getDividend = vi.fn().mockResolvedValue(123456789n);
    const cache = build(fakeChain(getDividend));

    expect(await cache.getOrFetch(QUERY)).toEqual({ value: 123456789n, wasCached: false });
    expect(await cache.getOrFetch(QUERY)).toEqual({ value: 123456789n, wasCached: true });
    expect(getDividend).toHaveBeenCalledTimes(1);
    expect(getDividend).toHaveBeenCalledWith(18, 'H1');
  });

  it('should fetch again once the entry has expired', async () => {
    const getDividend = vi.fn()
      .mockResolvedValueOnce(1n)
      .mockResolvedValueOnce(2n);
    const cache = build(fakeChain(getDividend));

    await cache.getOrFetch(QUERY);
    now += 120_000;

    expect(await cache.getOrFetch(QUERY)).toEqual({ value: 2n, wasCached: false });
  });

  it('should append a dividend record for every upstream fetch', async () => {
    const cache = build(fakeChain(vi.fn().mockResolvedValue(123456789n)));

    await cache.getOrFetch(QUERY);
    await cache.getOrFetch(QUERY);

    const rows = await history.list({ limit: 10, offset: 0 });
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      netuid: 18,
      hotkey: 'H1',
      dividend: 123456789n,
      source: 'chain',
      observedAt: new Date(now),
    });
  });

  it('should collapse concurrent misses into one upstream call', async () => {
    let resolve: (v: bigint) => void = () => undefined;
    const getDividend = vi.fn(() => new Promise<bigint>((r) => { resolve = r; }));
    const cache = build(fakeChain(getDividend));

    const reads = [cache.getOrFetch(QUERY), cache.getOrFetch(QUERY), cache.getOrFetch(QUERY)];
    await vi.waitFor(() => expect(getDividend).toHaveBeenCalledTimes(1));
    resolve(42n);

    const results = await Promise.all(reads);
    expect(results.map((r) => r.value)).toEqual([42n, 42n, 42n]);
    expect(getDividend).toHaveBeenCalledTimes(1);
    expect(cache.stats()).toMatchObject({ misses: 3, fetches: 1, collapsed: 2, inflight: 0 });
  });

  it('should retry transient failures before giving up', async () => {
    const getDividend = vi.fn()
      .mockRejectedValueOnce(new UpstreamUnavailableError())
      .mockResolvedValueOnce(9n);
    const cache = build(fakeChain(getDividend));

    expect(await cache.getOrFetch(QUERY)).toEqual({ value: 9n, wasCached: false });
    expect(getDividend).toHaveBeenCalledTimes(2);
    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
  });

  it('should not cache failures and surface them as upstream unavailable', async () => {
    const getDividend = vi.fn()
      .mockRejectedValueOnce(new UpstreamUnavailableError('rpc down'))
      .mockResolvedValueOnce(5n);
    const cache = build(fakeChain(getDividend), 1);

    const err = await cache.getOrFetch(QUERY).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UpstreamUnavailableError);
    expect(err).toHaveProperty('message', 'Dividend query failed: rpc down');
    expect(await history.list({ limit: 10, offset: 0 })).toHaveLength(0);

    expect(await cache.getOrFetch(QUERY)).toEqual({ value: 5n, wasCached: false });
    expect(cache.stats().failures).toBe(1);
  });
});

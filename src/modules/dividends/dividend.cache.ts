/**
 * DIVIDEND CACHE
 * ==============
 *
 * Read-through cache over the chain dividend query.
 *
 * - hit (`expiresAt > now`): no upstream call
 * - miss: chain query (timeout + retry), history record appended, then cached
 * - concurrent misses for one fingerprint share a single fetch
 * - failures are never cached and surface as UpstreamUnavailableError
 */

import { withRetry, withTimeout } from '../../common/async.js';
import { UpstreamUnavailableError, errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import type { CacheStats, CacheStore } from '../cache/cache.contracts.js';
import { InflightRegistry } from '../cache/inflight.registry.js';
import type { ChainClient } from '../chain/chain.contracts.js';
import type { DividendHistoryRepository } from '../history/history.contracts.js';
import { fingerprint, type CachedValue, type DividendQuery } from './dividend.contracts.js';

export interface DividendCacheConfig {
  ttlSeconds: number;
  chainTimeoutMs: number;
  attempts: number;
  retryBaseDelayMs: number;
}

export interface DividendCacheDeps {
  store: CacheStore;
  chain: ChainClient;
  history: DividendHistoryRepository;
  logger: Logger;
  config: DividendCacheConfig;
  clock?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class DividendCache {
  private inflight = new InflightRegistry<bigint>();
  private counters: CacheStats = { hits: 0, misses: 0, fetches: 0, collapsed: 0, failures: 0 };
  private clock: () => number;

  constructor(private readonly deps: DividendCacheDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  async getOrFetch(query: DividendQuery): Promise<CachedValue> {
    const key = fingerprint(query);

    const entry = await this.deps.store.get(key, this.clock());
    if (entry) {
      this.counters.hits++;
      return { value: entry.value, wasCached: true };
    }

    this.counters.misses++;
    const { promise, joined } = this.inflight.run(key, () => this.fetchAndStore(key, query));
    if (joined) this.counters.collapsed++;

    const value = await promise;
    return { value, wasCached: false };
  }

  stats(): CacheStats & { inflight: number } {
    return { ...this.counters, inflight: this.inflight.size() };
  }

  private async fetchAndStore(key: string, query: DividendQuery): Promise<bigint> {
    const { chain, history, store, logger, config } = this.deps;
    this.counters.fetches++;

    let value: bigint;
    try {
      value = await withRetry(
        () => withTimeout(chain.getDividend(query.netuid, query.hotkey), config.chainTimeoutMs, 'Chain dividend query'),
        {
          attempts: config.attempts,
          baseDelayMs: config.retryBaseDelayMs,
          onRetry: (err, attempt, delayMs) =>
            logger.warn({ key, attempt, delayMs, err: errorMessage(err) }, 'Retrying dividend query'),
          sleep: this.deps.sleep,
        },
      );
    } catch (err) {
      this.counters.failures++;
      logger.error({ key, err: errorMessage(err) }, 'Dividend query failed');
      throw new UpstreamUnavailableError(`Dividend query failed: ${errorMessage(err)}`);
    }

    const now = this.clock();
    await history.append({
      netuid: query.netuid,
      hotkey: query.hotkey,
      dividend: value,
      observedAt: new Date(now),
    });
    await store.set(key, value, config.ttlSeconds, now);

    logger.debug?.({ key, dividend: value.toString() }, 'Dividend cached');
    return value;
  }
}

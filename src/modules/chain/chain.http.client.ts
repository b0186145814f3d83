/**
 * Chain Gateway HTTP Client
 * =========================
 *
 * Talks JSON to a chain gateway that owns the RPC connection and the
 * signing wallet. Every call is rate limited and bounded by a timeout;
 * network failures, 429 and 5xx surface as retriable errors, rejected
 * transactions as final ones.
 *
 * @example
 * const chain = new HttpChainClient({ baseUrl: 'http://localhost:9944' });
 * const dividend = await chain.getDividend(18, '5F3sa2TJ...');
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { parseBigIntAmount } from '../../common/amounts.js';
import { ExternalApiError } from '../../common/errors.js';
import { toUpstreamError } from '../../common/http-errors.js';
import { schedule } from '../../common/rate-limiter.js';
import type { ChainClient, SubmitStakeInput, SubmitStakeResult } from './chain.contracts.js';

// ============================================
// RESPONSE SCHEMAS
// ============================================

const DividendResponse = z.object({
  dividend: z.union([z.string(), z.number()]),
});

const HotkeysResponse = z.object({
  hotkeys: z.array(z.string()),
});

const SubmitResponse = z.object({
  success: z.boolean(),
  tx_hash: z.string().nullish(),
  finalized: z.boolean().optional(),
  error: z.string().nullish(),
});

// ============================================
// CLIENT CONFIGURATION
// ============================================

export interface HttpChainClientConfig {
  baseUrl: string;
  timeout: number;
}

const DEFAULT_CONFIG: HttpChainClientConfig = {
  baseUrl: 'http://localhost:9944',
  timeout: 10_000,
};

// ============================================
// CLIENT
// ============================================

export class HttpChainClient implements ChainClient {
  readonly name = 'http';
  private client: AxiosInstance;
  private timeoutMs: number;

  constructor(config: Partial<HttpChainClientConfig> = {}, client?: AxiosInstance) {
    const effective = { ...DEFAULT_CONFIG, ...config };
    this.timeoutMs = effective.timeout;

    this.client = client ?? axios.create({
      baseURL: effective.baseUrl,
      timeout: effective.timeout,
      headers: {
        'Content-Type': 'application/json',
        'X-Client': 'tao-dividends-service',
      },
    });
  }

  async getDividend(netuid: number, hotkey: string): Promise<bigint> {
    const data = await this.call('getDividend', () =>
      this.client.get(`/dividends/${netuid}/${encodeURIComponent(hotkey)}`),
    );
    const parsed = DividendResponse.parse(data);
    return parseBigIntAmount(parsed.dividend);
  }

  async listHotkeys(netuid: number): Promise<string[]> {
    const data = await this.call('listHotkeys', () =>
      this.client.get(`/subnets/${netuid}/hotkeys`),
    );
    return HotkeysResponse.parse(data).hotkeys;
  }

  async submit(input: SubmitStakeInput): Promise<SubmitStakeResult> {
    const data = await this.call(input.operation, () =>
      this.client.post(`/${input.operation}`, {
        netuid: input.netuid,
        hotkey: input.hotkey,
        amount: input.amount,
      }),
    );

    const parsed = SubmitResponse.parse(data);
    if (!parsed.success || !parsed.tx_hash) {
      throw new ExternalApiError(`Chain rejected ${input.operation}: ${parsed.error ?? 'no transaction hash'}`);
    }

    return {
      txHash: parsed.tx_hash,
      finalized: parsed.finalized ?? true,
    };
  }

  private async call(label: string, request: () => Promise<{ data: unknown }>): Promise<unknown> {
    try {
      const res = await schedule('CHAIN', request);
      return res.data;
    } catch (err) {
      throw toUpstreamError(err, `Chain gateway ${label}`, this.timeoutMs);
    }
  }
}

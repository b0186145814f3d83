/**
 * Post Search Client
 * ==================
 *
 * Searches recent posts mentioning a subnet through the Datura search API.
 * Malformed entries in the response are skipped, not fatal.
 *
 * @example
 * const search = new PostSearchClient({ apiKey: process.env.DATURA_API_KEY });
 * const posts = await search.searchSubnet(18, 10);
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ExternalApiError } from '../../common/errors.js';
import { toUpstreamError } from '../../common/http-errors.js';
import type { Logger } from '../../common/logger.js';
import { silentLogger } from '../../common/logger.js';
import { schedule } from '../../common/rate-limiter.js';
import type { PostSearch, SearchPost } from './sentiment.contracts.js';

// ============================================
// RESPONSE SCHEMA
// ============================================

const count = z.number().int().nonnegative().catch(0);

const RawPost = z.object({
  id: z.string(),
  text: z.string(),
  url: z.string().default(''),
  created_at: z.string().default(''),
  user: z.object({
    username: z.string().default(''),
    followers_count: count,
    verified: z.boolean().default(false),
    is_blue_verified: z.boolean().default(false),
  }).default({}),
  like_count: count,
  retweet_count: count,
  reply_count: count,
  quote_count: count,
  bookmark_count: count,
});

// ============================================
// CLIENT
// ============================================

export interface PostSearchConfig {
  baseUrl: string;
  apiKey: string;
  timeout: number;
}

const DEFAULT_CONFIG: PostSearchConfig = {
  baseUrl: 'https://apis.datura.ai',
  apiKey: '',
  timeout: 15_000,
};

export class PostSearchClient implements PostSearch {
  private client: AxiosInstance;
  private timeoutMs: number;

  constructor(
    config: Partial<PostSearchConfig> = {},
    private readonly logger: Logger = silentLogger,
    client?: AxiosInstance,
  ) {
    const effective = { ...DEFAULT_CONFIG, ...config };
    this.timeoutMs = effective.timeout;

    this.client = client ?? axios.create({
      baseURL: effective.baseUrl,
      timeout: effective.timeout,
      headers: {
        Authorization: effective.apiKey,
        'Content-Type': 'application/json',
      },
    });
  }

  async searchSubnet(netuid: number, maxResults: number): Promise<SearchPost[]> {
    let data: unknown;
    try {
      const res = await schedule('DATURA', () =>
        this.client.post('/twitter', {
          query: `Bittensor netuid ${netuid}`,
          blue_verified: false,
          lang: 'en',
          sort: 'Latest',
          count: maxResults,
        }),
      );
      data = res.data;
    } catch (err) {
      throw toUpstreamError(err, 'Post search', this.timeoutMs);
    }

    if (!Array.isArray(data)) {
      throw new ExternalApiError('Post search returned an unexpected payload');
    }

    const posts: SearchPost[] = [];
    for (const item of data) {
      const parsed = RawPost.safeParse(item);
      if (!parsed.success) {
        this.logger.warn({ netuid, issues: parsed.error.issues.length }, 'Skipping malformed post');
        continue;
      }
      const p = parsed.data;
      posts.push({
        id: p.id,
        text: p.text,
        url: p.url,
        createdAt: p.created_at,
        author: {
          username: p.user.username,
          followers: p.user.followers_count,
          verified: p.user.verified || p.user.is_blue_verified,
        },
        likes: p.like_count,
        reposts: p.retweet_count,
        replies: p.reply_count,
        quotes: p.quote_count,
        bookmarks: p.bookmark_count,
      });
    }

    this.logger.info({ netuid, found: posts.length }, 'Post search completed');
    return posts;
  }
}

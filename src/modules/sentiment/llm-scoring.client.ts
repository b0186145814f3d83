/**
 * LLM Scoring Client
 * ==================
 *
 * Asks a chat-completions endpoint (Chutes) for a single integer sentiment
 * score in -100..100. Replies that are not a bare integer score 0.
 */

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ExternalApiError } from '../../common/errors.js';
import { toUpstreamError } from '../../common/http-errors.js';
import type { Logger } from '../../common/logger.js';
import { silentLogger } from '../../common/logger.js';
import { schedule } from '../../common/rate-limiter.js';
import {
  RAW_SCORE_MAX,
  RAW_SCORE_MIN,
  type PostScorer,
  type SearchPost,
} from './sentiment.contracts.js';

const CompletionResponse = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullish(),
    }),
  })),
});

export interface LlmScoringConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeout: number;
  maxTokens: number;
}

const DEFAULT_CONFIG: LlmScoringConfig = {
  baseUrl: 'https://llm.chutes.ai/v1',
  apiKey: '',
  model: 'unsloth/Llama-3.2-3B-Instruct',
  timeout: 15_000,
  maxTokens: 10,
};

// ============================================
// PROMPT
// ============================================

export function buildSystemPrompt(netuid: number): string {
  return [
    `Analyze the sentiment of these tweets about Bittensor subnet ${netuid}.`,
    'Rate the overall sentiment on a scale from -100 (extremely negative) to +100 (extremely positive).',
    'Consider both the content of the tweets and their engagement metrics.',
    'Tweets with higher engagement (likes, retweets) should be weighted more heavily.',
    'IMPORTANT: Your response must be ONLY a single integer number between -100 and +100,',
    'with no explanations, calculations, or additional text of any kind. Just the number.',
    'For example: 42 or -87',
  ].join('\n');
}

export function formatPost(post: SearchPost): string {
  const author = `@${post.author.username}${post.author.verified ? ' (verified)' : ''}`;
  const engagement =
    `[Engagement: ${post.likes} likes, ${post.reposts} retweets, ${post.replies} replies, ` +
    `${post.quotes} quotes, ${post.bookmarks} bookmarks]`;
  return `Tweet by ${author} (${post.author.followers} followers):\n${post.text}\n${engagement}\n`;
}

/** Bare (optionally signed) integer, clamped; anything else is null. */
export function parseScoreReply(reply: string): number | null {
  const match = /^\s*([+-]?\d+)\s*$/.exec(reply);
  if (!match) return null;
  const value = Number.parseInt(match[1], 10);
  return Math.max(RAW_SCORE_MIN, Math.min(RAW_SCORE_MAX, value));
}

// ============================================
// CLIENT
// ============================================

export class LlmScoringClient implements PostScorer {
  private client: AxiosInstance;
  private config: LlmScoringConfig;

  constructor(
    config: Partial<LlmScoringConfig> = {},
    private readonly logger: Logger = silentLogger,
    client?: AxiosInstance,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    this.client = client ?? axios.create({
      baseURL: this.config.baseUrl,
      timeout: this.config.timeout,
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
        'Content-Type': 'application/json',
      },
    });
  }

  async scorePosts(netuid: number, posts: SearchPost[]): Promise<number> {
    let data: unknown;
    try {
      const res = await schedule('CHUTES', () =>
        this.client.post('/chat/completions', {
          model: this.config.model,
          messages: [
            { role: 'system', content: buildSystemPrompt(netuid) },
            { role: 'user', content: posts.map(formatPost).join('\n\n') },
          ],
          max_tokens: this.config.maxTokens,
        }),
      );
      data = res.data;
    } catch (err) {
      throw toUpstreamError(err, 'Sentiment scoring', this.config.timeout);
    }

    const parsed = CompletionResponse.safeParse(data);
    if (!parsed.success) {
      throw new ExternalApiError('Sentiment scoring returned an unexpected payload');
    }

    const reply = parsed.data.choices[0]?.message.content ?? '0';
    const score = parseScoreReply(reply);
    if (score === null) {
      this.logger.warn({ netuid, reply }, 'Unparsable sentiment reply, scoring as neutral');
      return 0;
    }
    return score;
  }
}

/**
 * Sentiment Service
 * =================
 *
 * search → score → normalize, with an audit row per scored task.
 */

import { NoDataError } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import type { SentimentAnalysisRepository } from '../history/history.contracts.js';
import { directionFor } from '../trade/trade.policy.js';
import {
  RAW_SCORE_MAX,
  type PostScorer,
  type PostSearch,
  type SentimentProvider,
  type SentimentQuery,
  type SentimentScore,
} from './sentiment.contracts.js';

export interface SentimentServiceDeps {
  search: PostSearch;
  scorer: PostScorer;
  analyses: SentimentAnalysisRepository;
  logger: Logger;
  maxPosts: number;
  clock?: () => number;
}

export function normalizeScore(rawScore: number): number {
  return rawScore / RAW_SCORE_MAX;
}

export class SentimentService implements SentimentProvider {
  private clock: () => number;

  constructor(private readonly deps: SentimentServiceDeps) {
    this.clock = deps.clock ?? Date.now;
  }

  async score(query: SentimentQuery): Promise<SentimentScore> {
    const posts = await this.deps.search.searchSubnet(query.netuid, this.deps.maxPosts);
    if (posts.length === 0) {
      throw new NoDataError(`No posts found for subnet ${query.netuid}`);
    }

    const rawScore = await this.deps.scorer.scorePosts(query.netuid, posts);
    const score = normalizeScore(rawScore);

    await this.deps.analyses.append({
      taskId: query.taskId,
      netuid: query.netuid,
      hotkey: query.hotkey,
      rawScore,
      score,
      postsCount: posts.length,
      direction: directionFor(score),
      createdAt: new Date(this.clock()),
    });

    this.deps.logger.info(
      { taskId: query.taskId, netuid: query.netuid, rawScore, posts: posts.length },
      'Sentiment scored',
    );

    return { score, rawScore, postsCount: posts.length };
  }
}

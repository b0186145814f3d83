/**
 * Sentiment Contracts
 * ===================
 *
 * Recent public posts about a subnet are scored by an LLM on a -100..100
 * scale; the trade pipeline consumes the normalized -1..1 score.
 */

export interface SentimentQuery {
  taskId: string;
  netuid: number;
  hotkey: string;
}

export interface SentimentScore {
  score: number;       // -1..1
  rawScore: number;    // -100..100
  postsCount: number;
}

export interface SentimentProvider {
  /** Throws NoDataError when there is nothing to score. */
  score(query: SentimentQuery): Promise<SentimentScore>;
}

// ═══════════════════════════════════════════════════════════════
// POSTS
// ═══════════════════════════════════════════════════════════════

export interface PostAuthor {
  username: string;
  followers: number;
  verified: boolean;
}

export interface SearchPost {
  id: string;
  text: string;
  url: string;
  createdAt: string;
  author: PostAuthor;
  likes: number;
  reposts: number;
  replies: number;
  quotes: number;
  bookmarks: number;
}

export interface PostSearch {
  searchSubnet(netuid: number, maxResults: number): Promise<SearchPost[]>;
}

export interface PostScorer {
  /** Integer in -100..100; 0 when the model reply is not a number. */
  scorePosts(netuid: number, posts: SearchPost[]): Promise<number>;
}

export const RAW_SCORE_MIN = -100;
export const RAW_SCORE_MAX = 100;

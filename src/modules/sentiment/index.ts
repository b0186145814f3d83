export * from './sentiment.contracts.js';
export { PostSearchClient } from './post-search.client.js';
export { LlmScoringClient, parseScoreReply } from './llm-scoring.client.js';
export { SentimentService, normalizeScore } from './sentiment.service.js';

/**
 * History Module
 * ==============
 *
 * Append-only dividend, stake transaction and sentiment records.
 */

export * from './history.contracts.js';
export { createMemoryHistory } from './memory.history.repository.js';
export { createMongoHistory } from './mongo.history.repository.js';
export { registerHistoryRoutes, PageQuerySchema } from './history.routes.js';

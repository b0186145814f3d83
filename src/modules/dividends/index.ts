/**
 * Dividends Module
 * ================
 *
 * Cached dividend lookups and the trade trigger behind GET /tao_dividends.
 */

export * from './dividend.contracts.js';
export { DividendCache } from './dividend.cache.js';
export { DividendDispatcher } from './dividend.dispatcher.js';
export { registerDividendRoutes, toDividendJson, toBatchJson } from './dividend.routes.js';

/**
 * Chain Module
 * ============
 *
 * Dividend reads and stake/unstake submission. The service never speaks
 * the RPC protocol itself; it goes through a gateway or the mock.
 */

export * from './chain.contracts.js';
export { HttpChainClient } from './chain.http.client.js';
export { MockChainClient } from './chain.mock.client.js';

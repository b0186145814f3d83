export type { CacheEntry, CacheStore, CacheStats } from './cache.contracts.js';
export { MemoryCacheStore } from './memory.cache.store.js';
export { MongoCacheStore } from './mongo.cache.store.js';
export { InflightRegistry } from './inflight.registry.js';

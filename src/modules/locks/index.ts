export type { LockStore, TradeLock } from './lock.contracts.js';
export { MemoryLockStore } from './memory.lock.store.js';
export { MongoLockStore } from './mongo.lock.store.js';

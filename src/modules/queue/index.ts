export * from './queue.contracts.js';
export { MemoryTaskQueue } from './memory.task.queue.js';
export { MongoTaskQueue } from './mongo.task.queue.js';

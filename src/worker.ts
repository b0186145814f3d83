/**
 * Stand-alone worker entrypoint
 *
 * Run: npx tsx src/worker.ts
 * Consumes trade jobs from the shared Mongo queue; run as many as needed.
 */

import { createConsoleLogger } from './common/logger.js';
import { getEnv } from './config/env.js';
import { createContainer } from './container.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { ensureIndexes } from './db/indexes.js';

async function main() {
  const env = getEnv();

  if (env.STORAGE_DRIVER !== 'mongo') {
    throw new Error('A stand-alone worker needs STORAGE_DRIVER=mongo to share the queue with the API');
  }

  await connectMongo(env.MONGODB_URI);
  await ensureIndexes();

  const container = createContainer(env, createConsoleLogger('Worker'));
  container.workers.start();
  container.reconciler.start();

  const shutdown = async (signal: string) => {
    console.log(`[Worker] Received ${signal}, draining...`);
    container.reconciler.stop();
    await container.workers.stop();
    await disconnectMongo();
    console.log('[Worker] Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  console.log(`[Worker] ${container.workers.workerId} running (concurrency ${env.WORKER_CONCURRENCY})`);
}

main().catch((err) => {
  console.error('[Worker] Fatal error:', err);
  process.exit(1);
});

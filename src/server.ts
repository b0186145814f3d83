/**
 * API entrypoint
 *
 * Run: npx tsx src/server.ts
 * With WORKERS_IN_PROCESS=true the worker pool and reconciler run here too;
 * otherwise start src/worker.ts separately.
 */

import { buildApp } from './app.js';
import { getEnv } from './config/env.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { ensureIndexes } from './db/indexes.js';

async function main() {
  const env = getEnv();

  if (env.STORAGE_DRIVER === 'mongo') {
    await connectMongo(env.MONGODB_URI);
    await ensureIndexes();
  } else {
    console.log('[Server] STORAGE_DRIVER=memory, state is process-local');
  }

  const { app, container } = buildApp(env);

  if (env.WORKERS_IN_PROCESS) {
    container.workers.start();
    container.reconciler.start();
  }

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[Server] Received ${signal}, shutting down...`);
    container.reconciler.stop();
    await container.workers.stop();
    await app.close();
    await disconnectMongo();
    console.log('[Server] Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log(`[Server] Listening on ${env.HOST}:${env.PORT} (chain: ${container.chain.name}, storage: ${env.STORAGE_DRIVER})`);
}

main().catch((err) => {
  console.error('[Server] Fatal error:', err);
  process.exit(1);
});

import { Redis } from 'ioredis';
import { loadConfig } from './config.js';
import { createCatalog } from './catalog.js';
import { createRegenerationWorker } from './workers/thumbnail-regeneration.worker.js';

const config = loadConfig();
const catalog = await createCatalog(config, { requireDatabase: true });
const redis = new Redis({ ...config.redis, maxRetriesPerRequest: null });
const worker = await createRegenerationWorker(catalog.engine, redis);

const status = worker.getStatus();
console.log(`[Regen Worker] Consuming ${status.queue} (running: ${status.running})`);

async function shutdown(): Promise<void> {
  await worker.close();
  redis.disconnect();
  await catalog.close();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[Regen Worker] Failed to shut down cleanly:', err);
        process.exit(1);
      }
    );
  });
}

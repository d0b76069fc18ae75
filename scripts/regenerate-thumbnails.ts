#!/usr/bin/env tsx
/**
 * Rebuild every thumbnail after a thumbnail-size change.
 *
 *   tsx scripts/regenerate-thumbnails.ts [--after <id>] [--batch <n>]
 *   tsx scripts/regenerate-thumbnails.ts --queue [--after <id>]
 *
 * The in-process sweep prints the last processed id; pass it to --after to
 * resume. With --queue, one job per picture goes to the BullMQ queue instead.
 */

import { parseArgs } from 'node:util';
import { Redis } from 'ioredis';
import { loadConfig } from '../src/config.js';
import { createCatalog } from '../src/catalog.js';
import { RegenerationQueue } from '../src/services/regeneration-queue.js';

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      after: { type: 'string' },
      batch: { type: 'string' },
      queue: { type: 'boolean', default: false },
    },
  });

  const after = values.after !== undefined ? Number(values.after) : null;
  if (after !== null && !Number.isInteger(after)) {
    throw new Error(`--after must be a picture id, got "${values.after}"`);
  }
  const batchSize = values.batch !== undefined ? Number(values.batch) : undefined;

  const config = loadConfig();
  const catalog = await createCatalog(config, { requireDatabase: true });

  try {
    if (values.queue) {
      const redis = new Redis({ ...config.redis, maxRetriesPerRequest: null });
      const queue = new RegenerationQueue(redis);
      try {
        await queue.enqueueAll(catalog.store, { after, batchSize });
        const stats = await queue.getStats();
        console.log(`[regenerate] queue waiting=${stats.waiting} active=${stats.active} failed=${stats.failed}`);
      } finally {
        await queue.close();
        redis.disconnect();
      }
      return;
    }

    const report = await catalog.engine.regenerateThumbnails({ after, batchSize });
    console.log(`[regenerate] processed=${report.processed} regenerated=${report.regenerated} lastId=${report.lastId ?? '-'}`);
    if (report.skipped.length > 0) {
      console.log(`[regenerate] skipped (original missing): ${report.skipped.join(', ')}`);
    }
  } finally {
    await catalog.close();
  }
}

main().catch((error: unknown) => {
  console.error('[regenerate] Failed:', error);
  process.exitCode = 1;
});

#!/usr/bin/env tsx
/**
 * Report pictures whose files are missing and files no picture references.
 * With --sweep, the unreferenced files are deleted.
 */

import { parseArgs } from 'node:util';
import { loadConfig } from '../src/config.js';
import { createCatalog } from '../src/catalog.js';

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      sweep: { type: 'boolean', default: false },
    },
  });

  const catalog = await createCatalog(loadConfig(), { requireDatabase: true });

  try {
    const report = await catalog.engine.audit();

    for (const dangling of report.danglingPictures) {
      console.log(`[audit] picture ${dangling.id} is missing ${dangling.missing.join(', ')}`);
    }
    console.log(`[audit] ${report.danglingPictures.length} dangling pictures, ${report.orphanArtifacts.length} orphan artifacts`);

    if (values.sweep) {
      const removed = await catalog.engine.sweepOrphans();
      console.log(`[audit] removed ${removed.length} orphan artifacts`);
    } else {
      for (const name of report.orphanArtifacts) {
        console.log(`[audit] orphan ${name}`);
      }
    }
  } finally {
    await catalog.close();
  }
}

main().catch((error: unknown) => {
  console.error('[audit] Failed:', error);
  process.exitCode = 1;
});

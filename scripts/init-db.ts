#!/usr/bin/env tsx
/**
 * Create the catalog tables in the database named by DATABASE_URL
 */

import { loadConfig } from '../src/config.js';
import { createPoolExecutor, getPool } from '../src/db.js';
import { PgStore } from '../src/services/pg-store.js';

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL must be set');
  }

  const store = new PgStore(createPoolExecutor(getPool({ connectionString: config.databaseUrl })));
  try {
    await store.initialize();
    console.log('[init-db] Schema is up to date');
  } finally {
    await store.close();
  }
}

main().catch((error: unknown) => {
  console.error('[init-db] Failed:', error);
  process.exitCode = 1;
});

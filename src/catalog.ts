import { MemoryStore, type CatalogStore } from './store.js';
import { PgStore } from './services/pg-store.js';
import { createPoolExecutor, getPool } from './db.js';
import { ArtifactStore } from './services/artifact-store.js';
import { ListingService, type RandomIndex } from './services/listing.service.js';
import { CatalogEngine } from './services/catalog-engine.js';
import { ConfigurationError } from './errors.js';
import type { CatalogConfig } from './config.js';

export interface Catalog {
  config: CatalogConfig;
  store: CatalogStore;
  artifacts: ArtifactStore;
  engine: CatalogEngine;
  close(): Promise<void>;
}

export interface CatalogOverrides {
  store?: CatalogStore;
  randomIndex?: RandomIndex;
  /**
   * Refuse the in-memory fallback (workers and maintenance scripts)
   */
  requireDatabase?: boolean;
}

/**
 * Wire the store, content store, listing and engine from configuration.
 * PostgreSQL is used when DATABASE_URL is set, the in-memory store otherwise.
 */
export async function createCatalog(config: CatalogConfig, overrides: CatalogOverrides = {}): Promise<Catalog> {
  if (overrides.requireDatabase && !overrides.store && !config.databaseUrl) {
    throw new ConfigurationError('DATABASE_URL must be set; the in-memory store is private to the server process');
  }

  let store: CatalogStore;

  if (overrides.store) {
    store = overrides.store;
  } else if (config.databaseUrl) {
    store = new PgStore(createPoolExecutor(getPool({ connectionString: config.databaseUrl })));
    console.log('[Store] Using PostgreSQL database');
  } else {
    store = new MemoryStore();
    console.log('[Store] Using in-memory store');
  }
  await store.initialize?.();

  const artifacts = new ArtifactStore({
    root: config.contentRoot,
    allowedExtensions: config.allowedExtensions,
    maxWidth: config.thumbnail.maxWidth,
    maxHeight: config.thumbnail.maxHeight,
    quality: config.thumbnail.quality,
  });
  await artifacts.initialize();

  const listing = new ListingService(store, config.pageSize, overrides.randomIndex);
  const engine = new CatalogEngine(store, artifacts, listing, {
    unresolvedCategory: config.unresolvedCategory,
    requireOwner: config.requireOwner,
  });

  return {
    config,
    store,
    artifacts,
    engine,
    close: async () => {
      await store.close?.();
    },
  };
}

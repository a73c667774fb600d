import { SourceAggregator } from "./collector/aggregator.js";
import { HttpFetcher } from "./collector/fetcher.js";
import type { AppConfig } from "./shared/config.js";
import { createDatabase, type Database } from "./shared/db.js";
import { logger } from "./shared/logger.js";
import { PgCodesStore } from "./store/codes-store.js";
import { DiskCache } from "./store/disk-cache.js";
import { DownloadOrchestrator } from "./store/orchestrator.js";
import { TieredStore } from "./store/tiered-store.js";

export type CodesService = {
  store: TieredStore;
  orchestrator: DownloadOrchestrator;
  close: () => Promise<void>;
};

/**
 * Wires the collector and every storage tier from config. Without a database
 * URL the persisted tier is left out and refreshes are not persisted.
 */
export const createCodesService = (config: AppConfig): CodesService => {
  const db: Database | null = config.dbUrl ? createDatabase(config.dbUrl) : null;
  if (!db) {
    logger.warn("DATABASE_URL not set; codes will not be persisted");
  }

  const codesStore = db ? new PgCodesStore({ pool: db.pool, schema: config.dbSchema, table: config.dbTable }) : null;
  const cache = new DiskCache(config.cacheDir);
  const aggregator = new SourceAggregator({
    fetcher: new HttpFetcher({ timeoutMs: config.fetchTimeoutMs, userAgent: config.userAgent }),
    urls: config.sourceUrls
  });
  const orchestrator = new DownloadOrchestrator({ source: aggregator, store: codesStore, cache });
  const store = new TieredStore({
    cache,
    store: codesStore,
    fallbackCsv: config.fallbackCsv,
    orchestrator
  });

  return {
    store,
    orchestrator,
    close: async () => {
      await db?.close();
    }
  };
};

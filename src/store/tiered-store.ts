import { CodesNotFoundError } from "../shared/errors.js";
import { logger as rootLogger, type ILogger } from "../shared/logger.js";
import {
  describeQuery,
  matchesQuery,
  mergeBySymbol,
  type CategoryQuery,
  type CodeRecord
} from "../shared/record.js";
import type { CodesStore } from "./codes-store.js";
import type { DiskCache } from "./disk-cache.js";
import type { DownloadOrchestrator } from "./orchestrator.js";
import { CsvFallbackTier, DiskCacheTier, StoreTier, type CodeTier, type TierName } from "./tiers.js";

export type TieredStoreOptions = {
  cache: DiskCache;
  store?: CodesStore | null;
  fallbackCsv?: string | null;
  orchestrator?: DownloadOrchestrator | null;
  logger?: ILogger;
};

export type QueryOptions = {
  /** Re-download when no tier has the codes. Defaults to true. */
  download?: boolean;
};

export type QueryResult = {
  records: CodeRecord[];
  tier: TierName;
};

/**
 * Resolves a query against disk cache, database, bundled CSV and finally a
 * fresh download, in that order. Anything answered below the cache is written
 * back to the cache file for that query.
 */
export class TieredStore {
  private readonly cache: DiskCache;
  private readonly tiers: CodeTier[];
  private readonly orchestrator: DownloadOrchestrator | null;
  private readonly logger: ILogger;

  constructor(options: TieredStoreOptions) {
    this.cache = options.cache;
    this.orchestrator = options.orchestrator ?? null;
    this.logger = options.logger ?? rootLogger.child("store");
    this.tiers = [new DiskCacheTier(options.cache)];
    if (options.store) this.tiers.push(new StoreTier(options.store));
    if (options.fallbackCsv) this.tiers.push(new CsvFallbackTier(options.fallbackCsv));
  }

  async query(query: CategoryQuery, options: QueryOptions = {}): Promise<CodeRecord[]> {
    const { records } = await this.resolve(query, options);
    return records;
  }

  async resolve(query: CategoryQuery, options: QueryOptions = {}): Promise<QueryResult> {
    const label = describeQuery(query);

    for (const tier of this.tiers) {
      const result = await tier.read(query);
      switch (result.status) {
        case "error":
          this.logger.warn("Tier failed, falling through", { tier: tier.name, query: label, detail: result.detail });
          continue;
        case "not_found":
          this.logger.debug("Tier has no codes", { tier: tier.name, query: label });
          continue;
        case "found":
          return this.answer(query, tier.name, result.records);
      }
    }

    if ((options.download ?? true) && this.orchestrator) {
      this.logger.info("No stored codes, downloading", { query: label });
      const { records } = await this.orchestrator.refresh();
      const matching = records.filter((record) => matchesQuery(record, query));
      if (matching.length > 0) {
        return this.answer(query, "download", matching);
      }
    }

    throw new CodesNotFoundError(label);
  }

  private async answer(query: CategoryQuery, tier: TierName, found: CodeRecord[]): Promise<QueryResult> {
    const { records } = mergeBySymbol(found);
    if (tier !== "cache") {
      await this.writeThrough(query, records);
    }
    this.logger.debug("Resolved codes", { tier, query: describeQuery(query), records: records.length });
    return { records, tier };
  }

  private async writeThrough(query: CategoryQuery, records: CodeRecord[]) {
    try {
      await this.cache.write(query, records);
    } catch (error) {
      this.logger.warn("Could not write code cache", { path: this.cache.pathFor(query) }, error);
    }
  }
}

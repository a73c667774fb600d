export { SourceAggregator } from "./collector/aggregator.js";
export { HttpFetcher, decodeBody, type Fetcher, type FetchResponse } from "./collector/fetcher.js";
export { parseListingTable, splitSymbolName } from "./collector/parser.js";
export { SOURCES, type Source, type SourceUrls } from "./collector/sources.js";
export * from "./shared/errors.js";
export * from "./shared/record.js";
export { createDatabase, type Database } from "./shared/db.js";
export { createLogger, type ILogger } from "./shared/logger.js";
export { PgCodesStore, type CodesStore } from "./store/codes-store.js";
export { parseCsv, serializeCsv } from "./store/csv.js";
export { DiskCache } from "./store/disk-cache.js";
export { DownloadOrchestrator, type CodeSource, type RefreshResult } from "./store/orchestrator.js";
export { TieredStore, type QueryOptions, type QueryResult } from "./store/tiered-store.js";
export type { TierName, TierResult } from "./store/tiers.js";
export { createCodesService, type CodesService } from "./service.js";

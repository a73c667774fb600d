import { errorMessage } from "../shared/errors.js";
import { matchesQuery, type CategoryQuery, type CodeRecord } from "../shared/record.js";
import type { CodesStore } from "./codes-store.js";
import { readCsvFile } from "./csv.js";
import type { DiskCache } from "./disk-cache.js";

export type TierName = "cache" | "store" | "fallback" | "download";

export type TierResult =
  | { status: "found"; records: CodeRecord[] }
  | { status: "not_found" }
  | { status: "error"; detail: string; cause?: unknown };

export interface CodeTier {
  readonly name: TierName;
  read(query: CategoryQuery): Promise<TierResult>;
}

const NOT_FOUND: TierResult = { status: "not_found" };

export const found = (records: CodeRecord[]): TierResult =>
  records.length > 0 ? { status: "found", records } : NOT_FOUND;

export const failed = (detail: string, cause: unknown): TierResult => ({
  status: "error",
  detail: `${detail}: ${errorMessage(cause)}`,
  cause
});

export class DiskCacheTier implements CodeTier {
  readonly name = "cache";

  constructor(private readonly cache: DiskCache) {}

  async read(query: CategoryQuery): Promise<TierResult> {
    try {
      const records = await this.cache.read(query);
      return records ? found(records) : NOT_FOUND;
    } catch (error) {
      return failed(`Unreadable cache file ${this.cache.pathFor(query)}`, error);
    }
  }
}

export class StoreTier implements CodeTier {
  readonly name = "store";

  constructor(private readonly store: CodesStore) {}

  async read(query: CategoryQuery): Promise<TierResult> {
    try {
      if (!(await this.store.hasTable())) return NOT_FOUND;
      return found(await this.store.findByCategory(query));
    } catch (error) {
      return failed("Codes database unavailable", error);
    }
  }
}

export class CsvFallbackTier implements CodeTier {
  readonly name = "fallback";

  constructor(private readonly filePath: string) {}

  async read(query: CategoryQuery): Promise<TierResult> {
    try {
      const records = await readCsvFile(this.filePath);
      if (!records) return NOT_FOUND;
      return found(records.filter((record) => matchesQuery(record, query)));
    } catch (error) {
      return failed(`Unreadable fallback file ${this.filePath}`, error);
    }
  }
}

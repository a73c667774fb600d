import { PersistenceError, errorMessage } from "../shared/errors.js";
import { logger as rootLogger, type ILogger } from "../shared/logger.js";
import { ALL, matchesQuery, specific, type CategoryQuery, type CodeRecord } from "../shared/record.js";
import type { CodesStore } from "./codes-store.js";
import { writeCsvFile } from "./csv.js";
import type { DiskCache } from "./disk-cache.js";

export interface CodeSource {
  fetchAll(): Promise<CodeRecord[]>;
}

export type PersistOutcome = { ok: true; rows: number } | { ok: false; reason: string };

export type RefreshResult = {
  records: CodeRecord[];
  persisted: PersistOutcome;
  exportedTo: string | null;
};

export type RefreshOptions = {
  /** Also write the full set to this CSV path, in the fallback layout. */
  exportCsvPath?: string | null;
};

export type DownloadOrchestratorOptions = {
  source: CodeSource;
  store?: CodesStore | null;
  cache?: DiskCache | null;
  logger?: ILogger;
};

export class DownloadOrchestrator {
  private readonly source: CodeSource;
  private readonly store: CodesStore | null;
  private readonly cache: DiskCache | null;
  private readonly logger: ILogger;

  constructor(options: DownloadOrchestratorOptions) {
    this.source = options.source;
    this.store = options.store ?? null;
    this.cache = options.cache ?? null;
    this.logger = options.logger ?? rootLogger.child("refresh");
  }

  /**
   * Downloads every listing page and replaces the stored copy. Fetch and parse
   * errors propagate; a failed write only downgrades `persisted` and the
   * downloaded records are still returned.
   */
  async refresh(options: RefreshOptions = {}): Promise<RefreshResult> {
    const records = await this.source.fetchAll();
    const persisted = await this.persist(records);
    if (!persisted.ok) {
      this.logger.warn("Downloaded codes were not persisted", { reason: persisted.reason });
    }

    await this.invalidateCache();
    if (!persisted.ok && records.length > 0) {
      await this.seedCache(records);
    }
    const exportedTo = await this.exportCsv(records, options.exportCsvPath ?? null);

    this.logger.info("Refreshed listing codes", {
      records: records.length,
      persistedRows: persisted.ok ? persisted.rows : 0
    });
    return { records, persisted, exportedTo };
  }

  private async persist(records: CodeRecord[]): Promise<PersistOutcome> {
    if (!this.store) {
      return { ok: false, reason: "No codes database configured" };
    }
    if (records.length === 0) {
      return { ok: false, reason: "Download returned no records; stored codes left untouched" };
    }
    try {
      const rows = await this.store.replaceAll(records);
      if (rows === 0) {
        throw new PersistenceError("Could not insert data into database");
      }
      return { ok: true, rows };
    } catch (error) {
      return { ok: false, reason: errorMessage(error) };
    }
  }

  private async invalidateCache() {
    if (!this.cache) return;
    try {
      const removed = await this.cache.clear();
      this.logger.debug("Cleared code cache", { files: removed });
    } catch (error) {
      this.logger.warn("Could not clear code cache", {}, error);
    }
  }

  /** Without a stored copy the cache is the only place the download survives. */
  private async seedCache(records: CodeRecord[]) {
    if (!this.cache) return;
    const categories = new Set(records.map((record) => record.category));
    const queries: CategoryQuery[] = [ALL, ...[...categories].map((category) => specific(category))];
    try {
      for (const query of queries) {
        await this.cache.write(query, records.filter((record) => matchesQuery(record, query)));
      }
      this.logger.debug("Cached unpersisted download", { files: queries.length });
    } catch (error) {
      this.logger.warn("Could not cache downloaded codes", {}, error);
    }
  }

  private async exportCsv(records: CodeRecord[], filePath: string | null) {
    if (!filePath) return null;
    try {
      await writeCsvFile(filePath, records);
      return filePath;
    } catch (error) {
      this.logger.warn("Could not export codes to CSV", { filePath }, error);
      return null;
    }
  }
}

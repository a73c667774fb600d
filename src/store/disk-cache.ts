import fs from "fs";
import path from "path";
import { ALL, CATEGORIES, queryKey, type CategoryQuery, type CodeRecord } from "../shared/record.js";
import { isMissingFile, readCsvFile, writeCsvFile } from "./csv.js";

/**
 * One CSV file per query (`stock.csv`, `etf.csv`, `all.csv`, ...) in the
 * fallback layout. Files are trusted until cleared and can always be rebuilt.
 */
const CACHE_FILES = new Set([`${queryKey(ALL)}.csv`, ...CATEGORIES.map((info) => `${info.key}.csv`)]);

export class DiskCache {
  constructor(private readonly dir: string) {}

  pathFor(query: CategoryQuery) {
    return path.join(this.dir, `${queryKey(query)}.csv`);
  }

  read(query: CategoryQuery): Promise<CodeRecord[] | null> {
    return readCsvFile(this.pathFor(query));
  }

  write(query: CategoryQuery, records: CodeRecord[]) {
    return writeCsvFile(this.pathFor(query), records);
  }

  /** Removes the per-query files only; anything else in the directory stays. */
  async clear() {
    let entries: string[];
    try {
      entries = await fs.promises.readdir(this.dir);
    } catch (error) {
      if (isMissingFile(error)) return 0;
      throw error;
    }
    const files = entries.filter((entry) => CACHE_FILES.has(entry));
    await Promise.all(files.map((file) => fs.promises.rm(path.join(this.dir, file), { force: true })));
    return files.length;
  }
}

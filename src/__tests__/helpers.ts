import fs from "fs";
import os from "os";
import path from "path";
import type { ILogger } from "../shared/logger.js";
import { matchesQuery, sortBySymbol, type CategoryQuery, type CodeRecord } from "../shared/record.js";
import type { CodesStore } from "../store/codes-store.js";

export const silentLogger: ILogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger
};

export const makeRecord = (overrides: Partial<CodeRecord> & Pick<CodeRecord, "symbol">): CodeRecord => ({
  name: `Name ${overrides.symbol}`,
  category: "STOCK",
  isin_code: `TW000${overrides.symbol}0`,
  date_of_listing: "2001/01/02",
  market_type: "上市",
  industry: "半導體業",
  cfi_code: "ESVUFR",
  notes: null,
  ...overrides
});

const HEADER_ROW = ["有價證券代號及名稱", "國際證券辨識號碼(ISIN Code)", "上市日", "市場別", "產業別", "CFICode", "備註"];

/** A listing page shaped like the ISIN lookup service output. */
export const listingPage = (rows: string[][], tableClass = "h4") => {
  const body = [HEADER_ROW, ...rows]
    .map((cells) => `<tr>${cells.map((cell) => `<td>${cell}</td>`).join("")}</tr>`)
    .join("\n");
  return `<html><head><meta charset="utf-8"></head><body><table class="${tableClass}">\n${body}\n</table></body></html>`;
};

export const dataRow = (code: string, name: string, isin: string, extra: Partial<Record<"date" | "market" | "industry" | "cfi" | "notes", string>> = {}) => [
  `${code}　${name}`,
  isin,
  extra.date ?? "2001/01/02",
  extra.market ?? "上市",
  extra.industry ?? "半導體業",
  extra.cfi ?? "ESVUFR",
  extra.notes ?? ""
];

export const makeTempDir = (prefix = "isin-codes-") => fs.mkdtempSync(path.join(os.tmpdir(), prefix));

export const removeDir = (dir: string) => fs.rmSync(dir, { recursive: true, force: true });

export class InMemoryCodesStore implements CodesStore {
  rows = new Map<string, CodeRecord>();
  tablePresent = false;
  replaceCalls = 0;

  async hasTable() {
    return this.tablePresent;
  }

  async provision() {
    this.tablePresent = true;
  }

  async replaceAll(records: CodeRecord[]) {
    this.replaceCalls += 1;
    this.tablePresent = true;
    this.rows = new Map(records.map((record) => [record.symbol, record]));
    return this.rows.size;
  }

  async findByCategory(query: CategoryQuery) {
    return sortBySymbol(Array.from(this.rows.values()).filter((record) => matchesQuery(record, query)));
  }
}

import { UnknownCategoryError } from "./errors.js";

export type CodeRecord = {
  symbol: string;
  name: string;
  category: Category;
  isin_code: string;
  date_of_listing: string; // as published, empty for index rows
  market_type: string;
  industry: string;
  cfi_code: string;
  notes: string | null;
};

export type CodeField = keyof CodeRecord;

export type Column = {
  field: CodeField;
  short: string;
  label: string;
};

export const COLUMNS: readonly Column[] = [
  { field: "symbol", short: "sc", label: "代號" },
  { field: "name", short: "cn", label: "名稱" },
  { field: "category", short: "ca", label: "類別" },
  { field: "isin_code", short: "ic", label: "國際證券辨識號碼(ISIN Code)" },
  { field: "date_of_listing", short: "dl", label: "上市日" },
  { field: "market_type", short: "ma", label: "市場別" },
  { field: "industry", short: "si", label: "產業別" },
  { field: "cfi_code", short: "cc", label: "CFICode" },
  { field: "notes", short: "no", label: "備註" }
];

export const shortColumns = () => COLUMNS.map((column) => column.short);

export const longColumns = () => COLUMNS.map((column) => column.label);

const columnsByField = new Map(COLUMNS.map((column) => [column.field, column]));

export const columnFor = (field: CodeField): Column => {
  const column = columnsByField.get(field);
  if (!column) {
    throw new Error(`Unknown record field: ${field}`);
  }
  return column;
};

export const SYMBOL_COLUMN = columnFor("symbol").short;
export const CATEGORY_COLUMN = columnFor("category").short;

export const CATEGORY_LABELS = {
  STOCK: "股票",
  WARRANT: "上市認購(售)權證",
  SPECIAL_STOCK: "特別股",
  INNOVATION_BOARD: "創新板",
  ETF: "ETF",
  ETN: "ETN",
  TDR: "臺灣存託憑證(TDR)",
  ASSET_BASED_SECURITIES: "受益證券-資產基礎證券",
  REIT: "受益證券-不動產投資信託",
  OTC_WARRANT: "上櫃認購(售)權證",
  INDEX: "指數"
} as const;

export type Category = keyof typeof CATEGORY_LABELS;

export type CategoryInfo = {
  name: Category;
  key: string;
  label: string;
};

const isCategory = (value: string): value is Category => Object.hasOwn(CATEGORY_LABELS, value);

export const CATEGORIES: readonly CategoryInfo[] = Object.entries(CATEGORY_LABELS).flatMap(
  ([name, label]) => (isCategory(name) ? [{ name, key: name.toLowerCase(), label }] : [])
);

const categoriesByName = new Map(CATEGORIES.map((info) => [info.name, info]));
const categoriesByLabel = new Map(CATEGORIES.map((info) => [info.label, info]));

export const categoryInfo = (category: Category): CategoryInfo => {
  const info = categoriesByName.get(category);
  if (!info) {
    throw new UnknownCategoryError(category);
  }
  return info;
};

export const categoryLabel = (category: Category) => categoryInfo(category).label;

export const categoryKey = (category: Category) => categoryInfo(category).key;

export const categoryFromLabel = (label: string): Category | null =>
  categoriesByLabel.get(label.trim())?.name ?? null;

export type CategoryQuery = { kind: "all" } | { kind: "specific"; category: Category };

export const ALL: CategoryQuery = { kind: "all" };

export const specific = (category: Category): CategoryQuery => ({ kind: "specific", category });

export const parseCategoryQuery = (input: string | undefined): CategoryQuery => {
  const name = (input ?? "ALL").trim().toUpperCase();
  if (name === "ALL") return ALL;
  if (!isCategory(name)) {
    throw new UnknownCategoryError(input ?? "");
  }
  return specific(name);
};

export const describeQuery = (query: CategoryQuery): string => {
  switch (query.kind) {
    case "all":
      return "ALL";
    case "specific":
      return query.category;
  }
};

export const queryKey = (query: CategoryQuery): string => {
  switch (query.kind) {
    case "all":
      return "all";
    case "specific":
      return categoryKey(query.category);
  }
};

export const matchesQuery = (record: CodeRecord, query: CategoryQuery): boolean =>
  query.kind === "all" || record.category === query.category;

export const compareSymbols = (a: CodeRecord, b: CodeRecord) =>
  a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0;

export const sortBySymbol = (records: CodeRecord[]): CodeRecord[] => [...records].sort(compareSymbols);

export type MergeResult = {
  records: CodeRecord[];
  overridden: string[];
};

/** Later records replace earlier ones sharing a symbol; output is sorted by symbol. */
export const mergeBySymbol = (records: CodeRecord[]): MergeResult => {
  const bySymbol = new Map<string, CodeRecord>();
  const overridden: string[] = [];
  for (const record of records) {
    if (bySymbol.has(record.symbol)) {
      overridden.push(record.symbol);
    }
    bySymbol.set(record.symbol, record);
  }
  return { records: sortBySymbol(Array.from(bySymbol.values())), overridden };
};

export type RawRow = string[];

export type SerializedRow = Record<string, string>;

const cleanCell = (value: string | undefined) => (value ?? "").trim();

/** Builds a record from cells in column order; the category cell holds its published label. */
export const toCodeRecord = (row: RawRow): CodeRecord => {
  if (row.length !== COLUMNS.length) {
    throw new Error(`Expected ${COLUMNS.length} fields, got ${row.length}`);
  }
  const cells = new Map(COLUMNS.map((column, index) => [column.field, cleanCell(row[index])]));
  const cell = (field: CodeField) => cells.get(field) ?? "";
  const label = cell("category");
  const category = categoryFromLabel(label);
  if (!category) {
    throw new UnknownCategoryError(label);
  }
  const notes = cell("notes");
  return {
    symbol: cell("symbol"),
    name: cell("name"),
    category,
    isin_code: cell("isin_code"),
    date_of_listing: cell("date_of_listing"),
    market_type: cell("market_type"),
    industry: cell("industry"),
    cfi_code: cell("cfi_code"),
    notes: notes === "" ? null : notes
  };
};

const fieldValue = (record: CodeRecord, field: CodeField): string => {
  if (field === "category") return categoryLabel(record.category);
  return record[field] ?? "";
};

export const toRawRow = (record: CodeRecord): RawRow => COLUMNS.map((column) => fieldValue(record, column.field));

export const toSerializedRow = (record: CodeRecord): SerializedRow =>
  Object.fromEntries(COLUMNS.map((column) => [column.short, fieldValue(record, column.field)]));

export const fromSerializedRow = (row: Partial<SerializedRow>): CodeRecord =>
  toCodeRecord(COLUMNS.map((column) => row[column.short] ?? ""));

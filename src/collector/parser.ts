import * as cheerio from "cheerio";
import {
  CategorySequenceError,
  StructuralParseError,
  UnknownCategoryError
} from "../shared/errors.js";
import { COLUMNS, categoryFromLabel, categoryLabel, type RawRow } from "../shared/record.js";
import { hasCategoryHeaders, type Source } from "./sources.js";

export const TABLE_SELECTOR = "table.h4";
export const NAME_SEPARATOR = "　";

export type SymbolName = { symbol: string; name: string };

/** Splits "2330　台積電" on the full-width space; regular spaces inside the symbol are dropped. */
export const splitSymbolName = (cell: string, context: string): SymbolName => {
  const separator = cell.indexOf(NAME_SEPARATOR);
  if (separator < 0) {
    throw new StructuralParseError(`${context}: no full-width separator in "${cell.trim()}"`);
  }
  const symbol = cell.slice(0, separator).replace(/ /g, "").trim();
  const name = cell.slice(separator + NAME_SEPARATOR.length).trim();
  if (!symbol || /\s/.test(symbol)) {
    throw new StructuralParseError(`${context}: invalid symbol in "${cell.trim()}"`);
  }
  return { symbol, name };
};

const assertArity = (row: RawRow, context: string) => {
  if (row.length !== COLUMNS.length) {
    throw new StructuralParseError(`${context}: expected ${COLUMNS.length} fields, got ${row.length}`);
  }
  return row;
};

const INDEX_LABEL = categoryLabel("INDEX");

// Futures/index rows carry no listing date or market type; placeholders keep the arity.
const futuresRow = (cells: string[], context: string): RawRow => {
  const [first = "", isin = "", ...rest] = cells;
  const { symbol, name } = splitSymbolName(first, context);
  return assertArity([symbol, name, INDEX_LABEL, isin, "", "", ...rest], context);
};

const listingRow = (cells: string[], label: string, context: string): RawRow => {
  const [first = "", ...rest] = cells;
  const { symbol, name } = splitSymbolName(first, context);
  return assertArity([symbol, name, label, ...rest], context);
};

/**
 * Reads the listing table of one page into rows ordered like COLUMNS, with the
 * category cell holding the published section label.
 *
 * Listed and OTC pages announce each category in a single-cell row; every data
 * row below it belongs to that category until the next one.
 */
export const parseListingTable = (html: string, source: Source): RawRow[] => {
  const $ = cheerio.load(html);
  const table = $(TABLE_SELECTOR).first();
  if (table.length === 0) {
    throw new StructuralParseError(`No ${TABLE_SELECTOR} listing table found in ${source} document`);
  }

  const rows: RawRow[] = [];
  let currentLabel: string | null = hasCategoryHeaders(source) ? null : INDEX_LABEL;

  table
    .find("tr")
    .slice(1)
    .each((index, element) => {
      const rowIndex = index + 1;
      const context = `${source} row ${rowIndex}`;
      const cells = $(element)
        .find("td")
        .map((_, td) => $(td).text())
        .get();
      if (cells.length === 0) return;

      if (!hasCategoryHeaders(source)) {
        rows.push(futuresRow(cells, context));
        return;
      }

      if (cells.length === 1) {
        const label = cells[0].trim();
        if (!categoryFromLabel(label)) {
          throw new UnknownCategoryError(label);
        }
        currentLabel = label;
        return;
      }

      if (currentLabel === null) {
        throw new CategorySequenceError(source, rowIndex);
      }
      rows.push(listingRow(cells, currentLabel, context));
    });

  return rows;
};

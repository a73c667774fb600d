import fs from "fs";
import path from "path";
import Papa from "papaparse";
import { StructuralParseError } from "../shared/errors.js";
import {
  SYMBOL_COLUMN,
  fromSerializedRow,
  shortColumns,
  toRawRow,
  type CodeRecord,
  type SerializedRow
} from "../shared/record.js";

/** Header row of short column names, one record per line, category as its published label. */
export const serializeCsv = (records: CodeRecord[]): string =>
  Papa.unparse(
    {
      fields: shortColumns(),
      data: records.map(toRawRow)
    },
    { newline: "\n" }
  ) + "\n";

export const parseCsvRows = (text: string, source = "csv"): SerializedRow[] => {
  const parsed = Papa.parse<SerializedRow>(text, {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: true
  });
  if (parsed.errors.length > 0) {
    const [first] = parsed.errors;
    throw new StructuralParseError(`${source}: ${first.message} (row ${first.row ?? "?"})`);
  }
  return parsed.data;
};

/** Rows without a symbol are skipped. */
export const parseCsv = (text: string, source?: string): CodeRecord[] =>
  parseCsvRows(text, source)
    .filter((row) => (row[SYMBOL_COLUMN] ?? "").trim() !== "")
    .map(fromSerializedRow);

export const readCsvFile = async (filePath: string): Promise<CodeRecord[] | null> => {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
  return parseCsv(text, filePath);
};

/** Writes to a sibling temp file and renames it into place, so readers never see a partial file. */
export const writeCsvFile = async (filePath: string, records: CodeRecord[]) => {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  try {
    await fs.promises.writeFile(tempPath, serializeCsv(records), "utf-8");
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
};

export const isMissingFile = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

import { describe, it, expect } from "vitest";
import { dataRow, listingPage } from "../../__tests__/helpers.js";
import { CategorySequenceError, StructuralParseError, UnknownCategoryError } from "../../shared/errors.js";
import { toCodeRecord } from "../../shared/record.js";
import { parseListingTable, splitSymbolName } from "../parser.js";

describe("splitSymbolName", () => {
  it("splits on the full-width space", () => {
    expect(splitSymbolName("2330　台積電", "test")).toEqual({ symbol: "2330", name: "台積電" });
  });

  it("drops regular spaces inside the symbol", () => {
    expect(splitSymbolName("91 01　美德醫療-DR", "test")).toEqual({ symbol: "9101", name: "美德醫療-DR" });
  });

  it("rejects a cell without the separator", () => {
    expect(() => splitSymbolName("2330 台積電", "LISTED row 2")).toThrow(StructuralParseError);
  });

  it("rejects an empty symbol", () => {
    expect(() => splitSymbolName("　台積電", "LISTED row 2")).toThrow(StructuralParseError);
  });
});

describe("parseListingTable", () => {
  it("carries each category header over the data rows below it", () => {
    const html = listingPage([
      ["股票"],
      dataRow("1101", "台泥", "TW0001101004"),
      dataRow("2330", "台積電", "TW0002330008"),
      ["ETF"],
      dataRow("0050", "元大台灣50", "TW0000050004")
    ]);

    const rows = parseListingTable(html, "LISTED");

    expect(rows).toHaveLength(3);
    expect(rows.map((row) => row[2])).toEqual(["股票", "股票", "ETF"]);
    expect(rows[0]).toEqual(["1101", "台泥", "股票", "TW0001101004", "2001/01/02", "上市", "半導體業", "ESVUFR", ""]);
    expect(rows.map(toCodeRecord).map((record) => record.category)).toEqual(["STOCK", "STOCK", "ETF"]);
  });

  it("keeps document order", () => {
    const html = listingPage([
      ["股票"],
      dataRow("2330", "台積電", "TW0002330008"),
      dataRow("1101", "台泥", "TW0001101004")
    ]);

    expect(parseListingTable(html, "OTC").map((row) => row[0])).toEqual(["2330", "1101"]);
  });

  it("trims the header text before matching it", () => {
    const html = listingPage([[" 特別股 "], dataRow("1101B", "台泥乙特", "TW0001101B04")]);

    expect(parseListingTable(html, "LISTED")[0][2]).toBe("特別股");
  });

  it("normalizes symbols that contain regular spaces", () => {
    const html = listingPage([["股票"], dataRow("91 01", "美德醫療", "TW0009101000")]);

    expect(parseListingTable(html, "LISTED")[0][0]).toBe("9101");
  });

  it("tags every futures/index row as INDEX with empty date and market columns", () => {
    const html = listingPage([
      ["IX0001　加權指數", "TW000IX00011", "", "MRIXXX", ""],
      ["IX0027　電子類指數", "TW000IX00276", "", "MRIXXX", ""]
    ]);

    const records = parseListingTable(html, "FUTURES_INDEX").map(toCodeRecord);

    expect(records.map((record) => record.category)).toEqual(["INDEX", "INDEX"]);
    expect(records.map((record) => [record.date_of_listing, record.market_type])).toEqual([
      ["", ""],
      ["", ""]
    ]);
    expect(records[0]).toEqual({
      symbol: "IX0001",
      name: "加權指數",
      category: "INDEX",
      isin_code: "TW000IX00011",
      date_of_listing: "",
      market_type: "",
      industry: "",
      cfi_code: "MRIXXX",
      notes: null
    });
  });

  it("fails when the listing table is missing", () => {
    const html = listingPage([["股票"], dataRow("2330", "台積電", "TW0002330008")], "h3");

    expect(() => parseListingTable(html, "LISTED")).toThrow(StructuralParseError);
  });

  it("fails when a data row comes before any category header", () => {
    const html = listingPage([dataRow("2330", "台積電", "TW0002330008"), ["股票"]]);

    expect(() => parseListingTable(html, "LISTED")).toThrow(CategorySequenceError);
  });

  it("fails on a header that is not a known category", () => {
    const html = listingPage([["管理股票"], dataRow("2330", "台積電", "TW0002330008")]);

    expect(() => parseListingTable(html, "OTC")).toThrow(UnknownCategoryError);
  });

  it("fails when a data row has the wrong number of cells", () => {
    const html = listingPage([["股票"], ["2330　台積電", "TW0002330008", "1994/09/05"]]);

    expect(() => parseListingTable(html, "LISTED")).toThrow(/expected 9 fields, got 5/);
  });
});

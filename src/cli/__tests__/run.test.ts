import path from "path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { InMemoryCodesStore, makeRecord, makeTempDir, removeDir, silentLogger } from "../../__tests__/helpers.js";
import { UnknownCategoryError } from "../../shared/errors.js";
import type { CodesStore } from "../../store/codes-store.js";
import { DiskCache } from "../../store/disk-cache.js";
import { DownloadOrchestrator } from "../../store/orchestrator.js";
import { TieredStore } from "../../store/tiered-store.js";
import { parseArgs, runCli } from "../run.js";

describe("parseArgs", () => {
  it("defaults to an ALL query", () => {
    expect(parseArgs([])).toEqual({
      download: false,
      get: true,
      query: { kind: "all" },
      allowDownload: true,
      csvPath: null,
      json: false
    });
  });

  it("downloads without querying when only --download is given", () => {
    expect(parseArgs(["--download"])).toMatchObject({ download: true, get: false });
  });

  it("allows --download and --get together", () => {
    expect(parseArgs(["-d", "-g", "--category=etf", "--csv=out/codes.csv"])).toMatchObject({
      download: true,
      get: true,
      query: { kind: "specific", category: "ETF" },
      csvPath: "out/codes.csv"
    });
  });

  it("rejects unknown categories and flags", () => {
    expect(() => parseArgs(["--category=BOND"])).toThrow(UnknownCategoryError);
    expect(() => parseArgs(["--verbose"])).toThrow("Unknown argument: --verbose");
  });
});

describe("runCli", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  const setup = (codesStore: CodesStore) => {
    const cache = new DiskCache(path.join(dir, "cache"));
    const records = [makeRecord({ symbol: "0050", name: "元大台灣50", category: "ETF" }), makeRecord({ symbol: "2330" })];
    const orchestrator = new DownloadOrchestrator({
      source: { fetchAll: async () => records },
      store: codesStore,
      cache,
      logger: silentLogger
    });
    const store = new TieredStore({ cache, store: codesStore, orchestrator, logger: silentLogger });
    const print = vi.fn();
    return { store, orchestrator, print };
  };

  it("prints the queried codes as CSV", async () => {
    const deps = setup(new InMemoryCodesStore());

    const exitCode = await runCli(parseArgs(["--get", "--category=ETF"]), deps);

    expect(exitCode).toBe(0);
    expect(deps.print).toHaveBeenCalledWith(
      "sc,cn,ca,ic,dl,ma,si,cc,no\n0050,元大台灣50,ETF,TW00000500,2001/01/02,上市,半導體業,ESVUFR,"
    );
  });

  it("prints the download and exits non-zero when it could not be persisted", async () => {
    const codesStore = new InMemoryCodesStore();
    vi.spyOn(codesStore, "replaceAll").mockRejectedValue(new Error("connection terminated"));
    const deps = setup(codesStore);

    const exitCode = await runCli(parseArgs(["--download", "--json"]), deps);

    expect(exitCode).toBe(1);
    expect(deps.print).toHaveBeenCalledTimes(1);
    const printed: unknown = JSON.parse(String(deps.print.mock.calls[0][0]));
    expect(printed).toHaveLength(2);
  });
});

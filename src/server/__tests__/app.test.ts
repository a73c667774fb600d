import path from "path";
import request from "supertest";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { InMemoryCodesStore, makeRecord, makeTempDir, removeDir, silentLogger } from "../../__tests__/helpers.js";
import { TransportError } from "../../shared/errors.js";
import { DiskCache } from "../../store/disk-cache.js";
import { DownloadOrchestrator, type CodeSource } from "../../store/orchestrator.js";
import { TieredStore } from "../../store/tiered-store.js";
import { createApp } from "../app.js";

const API_KEY = "test-secret";

const stock = makeRecord({ symbol: "2330", name: "台積電" });
const etf = makeRecord({ symbol: "0050", name: "元大台灣50", category: "ETF" });

describe("codes API", () => {
  let dir: string;
  let codesStore: InMemoryCodesStore;
  let source: CodeSource;

  const buildApp = () => {
    const cache = new DiskCache(path.join(dir, "cache"));
    const orchestrator = new DownloadOrchestrator({ source, store: codesStore, cache, logger: silentLogger });
    const store = new TieredStore({ cache, store: codesStore, orchestrator, logger: silentLogger });
    return createApp({ store, orchestrator, apiKey: API_KEY });
  };

  beforeEach(async () => {
    dir = makeTempDir();
    codesStore = new InMemoryCodesStore();
    await codesStore.replaceAll([stock, etf]);
    source = { fetchAll: vi.fn(async () => [stock, etf]) };
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("serves /health without a key", async () => {
    const res = await request(buildApp()).get("/health");

    expect(res.status).toBe(200);
    expect(res.text).toBe("OK");
  });

  it("rejects requests without the API key", async () => {
    const res = await request(buildApp()).get("/codes");

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: "Unauthorized" });
  });

  it("lists codes for a category", async () => {
    const res = await request(buildApp()).get("/codes?category=etf").set("x-api-key", API_KEY);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ count: 1, tier: "store", records: [etf] });
  });

  it("accepts a bearer token and defaults to ALL", async () => {
    const res = await request(buildApp()).get("/codes").set("Authorization", `Bearer ${API_KEY}`);

    expect(res.status).toBe(200);
    expect(res.body.records.map((record: { symbol: string }) => record.symbol)).toEqual(["0050", "2330"]);
  });

  it("returns 400 for an unknown category", async () => {
    const res = await request(buildApp()).get("/codes?category=BOND").set("x-api-key", API_KEY);

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Cannot find category: BOND" });
  });

  it("returns 404 when no tier has the category", async () => {
    const res = await request(buildApp()).get("/codes?category=REIT&download=false").set("x-api-key", API_KEY);

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "No codes found for REIT" });
  });

  it("looks up a single symbol", async () => {
    const app = buildApp();

    const found = await request(app).get("/codes/2330").set("x-api-key", API_KEY);
    const missing = await request(app).get("/codes/9999").set("x-api-key", API_KEY);

    expect(found.status).toBe(200);
    expect(found.body).toEqual(stock);
    expect(missing.status).toBe(404);
  });

  it("refreshes on demand", async () => {
    const res = await request(buildApp()).post("/codes/refresh").set("x-api-key", API_KEY);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ count: 2, persisted: { ok: true, rows: 2 } });
    expect(source.fetchAll).toHaveBeenCalledTimes(1);
  });

  it("surfaces download failures as 500", async () => {
    source = {
      fetchAll: async () => {
        throw new TransportError("https://isin.example/listed", "Download request failed (502) for LISTED", {
          statusCode: 502
        });
      }
    };

    const res = await request(buildApp()).post("/codes/refresh").set("x-api-key", API_KEY);

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: "Download request failed (502) for LISTED" });
  });
});

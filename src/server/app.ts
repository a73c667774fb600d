import express from "express";
import { CodesNotFoundError, UnknownCategoryError, errorMessage } from "../shared/errors.js";
import { parseCategoryQuery, type CodeRecord } from "../shared/record.js";
import type { DownloadOrchestrator } from "../store/orchestrator.js";
import type { TieredStore } from "../store/tiered-store.js";

export type AppDeps = {
  store: TieredStore;
  orchestrator: DownloadOrchestrator;
  apiKey: string;
};

const getApiKey = (req: express.Request): string | null => {
  const headerKey = req.header("x-api-key");
  if (headerKey) return headerKey;
  const auth = req.header("authorization");
  if (!auth) return null;
  const match = auth.match(/^Bearer\s+(.+)$/i);
  return match ? match[1] : null;
};

const authMiddleware =
  (expected: string): express.RequestHandler =>
  (req, res, next) => {
    if (req.path === "/health") {
      return next();
    }
    if (!expected) {
      return res.status(500).json({ error: "API_KEY not configured" });
    }
    const provided = getApiKey(req);
    if (!provided || provided !== expected) {
      return res.status(401).json({ error: "Unauthorized" });
    }
    return next();
  };

const statusFor = (error: unknown) => {
  if (error instanceof UnknownCategoryError) return 400;
  if (error instanceof CodesNotFoundError) return 404;
  return 500;
};

const sendError = (res: express.Response, error: unknown) =>
  res.status(statusFor(error)).json({ error: errorMessage(error, "Lookup failed") });

const stringParam = (value: unknown) => (typeof value === "string" ? value : undefined);

export const createApp = (deps: AppDeps) => {
  const app = express();
  app.use(express.json());
  app.use(authMiddleware(deps.apiKey));

  app.get("/health", (_req, res) => {
    res.status(200).send("OK");
  });

  app.get("/codes", async (req, res) => {
    try {
      const query = parseCategoryQuery(stringParam(req.query.category));
      const download = stringParam(req.query.download) !== "false";
      const { records, tier } = await deps.store.resolve(query, { download });
      res.json({ count: records.length, tier, records });
    } catch (error) {
      sendError(res, error);
    }
  });

  app.get("/codes/:symbol", async (req, res) => {
    try {
      const records = await deps.store.query(parseCategoryQuery(undefined), { download: false });
      const record: CodeRecord | undefined = records.find((item) => item.symbol === req.params.symbol);
      if (!record) {
        return res.status(404).json({ error: "Not found" });
      }
      return res.json(record);
    } catch (error) {
      return sendError(res, error);
    }
  });

  app.post("/codes/refresh", async (_req, res) => {
    try {
      const { records, persisted } = await deps.orchestrator.refresh();
      res.status(persisted.ok ? 200 : 207).json({ count: records.length, persisted });
    } catch (error) {
      sendError(res, error);
    }
  });

  return app;
};

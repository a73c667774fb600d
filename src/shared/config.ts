import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import dotenv from "dotenv";

const isProdEnv = process.env.CODES_ENV === "prod" || process.env.NODE_ENV === "production";
const envFile = isProdEnv ? ".env.prod" : ".env.dev";
const envPath = path.resolve(process.cwd(), envFile);
const envFileExists = fs.existsSync(envPath);

if (envFileExists) {
  dotenv.config({ path: envPath });
}

export const envInfo = {
  envFile,
  envPath,
  envFileExists
};

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// src/shared and dist/shared both sit two levels below the project root.
export const dataDir = path.resolve(__dirname, "..", "..", "data");

const numberEnv = (key: string, fallback: number): number => {
  const parsed = Number(process.env[key]);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const ISIN_BASE_URL = "https://isin.twse.com.tw/isin/C_public.jsp";

export const config = {
  apiKey: process.env.API_KEY ?? "",
  port: Number(process.env.PORT ?? 3000),
  dbUrl: process.env.DATABASE_URL ?? process.env.POSTGRES_URL ?? "",
  dbSchema: process.env.CODES_DB_SCHEMA ?? "mt_symbols",
  dbTable: process.env.CODES_TABLE ?? "twse",
  cacheDir: path.resolve(process.cwd(), process.env.CODES_CACHE_DIR ?? path.join(".cache", "codes")),
  fallbackCsv: process.env.CODES_FALLBACK_CSV
    ? path.resolve(process.cwd(), process.env.CODES_FALLBACK_CSV)
    : path.join(dataDir, "codes.csv"),
  sourceUrls: {
    LISTED: process.env.LISTED_URL ?? `${ISIN_BASE_URL}?strMode=2`,
    OTC: process.env.OTC_URL ?? `${ISIN_BASE_URL}?strMode=4`,
    FUTURES_INDEX: process.env.FUTURES_INDEX_URL ?? `${ISIN_BASE_URL}?strMode=11`
  },
  fetchTimeoutMs: numberEnv("FETCH_TIMEOUT_MS", 30_000),
  userAgent: process.env.USER_AGENT ?? "isin-codes/0.1 (+https://example.local)"
};

export type AppConfig = typeof config;

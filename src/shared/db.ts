import fs from "fs";
import path from "path";
import pg from "pg";
import type { Pool, PoolConfig } from "pg";
import { dataDir } from "./config.js";
import { logger } from "./logger.js";

export type Database = {
  pool: Pool;
  close: () => Promise<void>;
};

const getSslConfig = (dbUrl: string): PoolConfig["ssl"] | undefined => {
  let sslMode = process.env.DATABASE_SSLMODE ?? process.env.PGSSLMODE ?? "";

  try {
    const url = new URL(dbUrl);
    sslMode = sslMode || url.searchParams.get("sslmode") || "";
  } catch {
    // Malformed URLs are left for pg to reject; sslmode comes from env only.
  }

  if (!sslMode) return undefined;
  if (sslMode === "disable") return false;
  if (sslMode === "verify-full") return { rejectUnauthorized: true };
  return { rejectUnauthorized: false };
};

/** Opened once per process by an entry point and handed to whatever needs the store. */
export const createDatabase = (dbUrl: string): Database => {
  if (!dbUrl) {
    throw new Error("DATABASE_URL is required");
  }
  const pool = new pg.Pool({
    connectionString: dbUrl,
    ssl: getSslConfig(dbUrl)
  });
  // Idle clients dropped by the server surface here; the next checkout reconnects.
  pool.on("error", (error) => {
    logger.warn("Idle database client failed", {}, error);
  });
  let closed = false;
  return {
    pool,
    close: async () => {
      if (closed) return;
      closed = true;
      await pool.end();
    }
  };
};

export const quoteIdent = (name: string) => `"${name.replace(/"/g, '""')}"`;

let schemaTemplate: string | null = null;

/** DDL from data/schema.sql with the schema and table names filled in. */
export const renderSchemaSql = (dbSchema: string, dbTable: string) => {
  schemaTemplate ??= fs.readFileSync(path.join(dataDir, "schema.sql"), "utf-8");
  return schemaTemplate.replaceAll("{{schema}}", quoteIdent(dbSchema)).replaceAll("{{table}}", quoteIdent(dbTable));
};

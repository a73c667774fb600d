import type { Pool, PoolClient } from "pg";
import { StorageConnectionError, errorMessage } from "../shared/errors.js";
import { quoteIdent, renderSchemaSql } from "../shared/db.js";
import { logger as rootLogger, type ILogger } from "../shared/logger.js";
import {
  CATEGORY_COLUMN,
  SYMBOL_COLUMN,
  categoryLabel,
  fromSerializedRow,
  shortColumns,
  toRawRow,
  type CategoryQuery,
  type CodeRecord
} from "../shared/record.js";

/** Persisted copy of the full code list, keyed by symbol. */
export interface CodesStore {
  hasTable(): Promise<boolean>;
  provision(): Promise<void>;
  /** Drops whatever is stored and writes `records`; resolves to the number of rows written. */
  replaceAll(records: CodeRecord[]): Promise<number>;
  findByCategory(query: CategoryQuery): Promise<CodeRecord[]>;
}

type PersistedRow = {
  sc: string;
  cn: string;
  ca: string;
  ic: string;
  dl: string;
  ma: string;
  si: string;
  cc: string;
  no: string | null;
};

const INSERT_BATCH_SIZE = 500;

export type PgCodesStoreOptions = {
  pool: Pool;
  schema: string;
  table: string;
  logger?: ILogger;
};

export class PgCodesStore implements CodesStore {
  private readonly pool: Pool;
  private readonly schema: string;
  private readonly table: string;
  private readonly logger: ILogger;

  constructor(options: PgCodesStoreOptions) {
    this.pool = options.pool;
    this.schema = options.schema;
    this.table = options.table;
    this.logger = options.logger ?? rootLogger.child("codes-store");
  }

  private get qualifiedTable() {
    return `${quoteIdent(this.schema)}.${quoteIdent(this.table)}`;
  }

  private async connect(): Promise<PoolClient> {
    try {
      return await this.pool.connect();
    } catch (error) {
      throw new StorageConnectionError(`Could not connect to the codes database: ${errorMessage(error)}`, {
        cause: error
      });
    }
  }

  async hasTable(): Promise<boolean> {
    const client = await this.connect();
    try {
      const result = await client.query(
        `SELECT 1 FROM information_schema.tables WHERE table_schema = $1 AND table_name = $2`,
        [this.schema, this.table]
      );
      return result.rows.length > 0;
    } finally {
      client.release();
    }
  }

  async provision(): Promise<void> {
    const client = await this.connect();
    try {
      await client.query(renderSchemaSql(this.schema, this.table));
    } finally {
      client.release();
    }
  }

  async replaceAll(records: CodeRecord[]): Promise<number> {
    const client = await this.connect();
    const columns = shortColumns();
    try {
      await client.query("BEGIN");
      await client.query(`DROP TABLE IF EXISTS ${this.qualifiedTable}`);
      await client.query(renderSchemaSql(this.schema, this.table));

      let inserted = 0;
      for (let start = 0; start < records.length; start += INSERT_BATCH_SIZE) {
        const batch = records.slice(start, start + INSERT_BATCH_SIZE);
        const params: string[] = [];
        const tuples = batch.map((record) => {
          const refs = toRawRow(record).map((value) => {
            params.push(value);
            return `$${params.length}`;
          });
          return `(${refs.join(", ")})`;
        });
        const result = await client.query(
          `INSERT INTO ${this.qualifiedTable} (${columns.join(", ")}) VALUES ${tuples.join(", ")}`,
          params
        );
        inserted += result.rowCount ?? 0;
      }

      await client.query("COMMIT");
      return inserted;
    } catch (error) {
      await client.query("ROLLBACK").catch((rollbackError: unknown) => {
        this.logger.warn("Rollback failed", { table: this.qualifiedTable }, rollbackError);
      });
      throw error;
    } finally {
      client.release();
    }
  }

  async findByCategory(query: CategoryQuery): Promise<CodeRecord[]> {
    const client = await this.connect();
    try {
      const params: string[] = [];
      const where = query.kind === "specific" ? ` WHERE ${CATEGORY_COLUMN} = $1` : "";
      if (query.kind === "specific") {
        params.push(categoryLabel(query.category));
      }
      const result = await client.query<PersistedRow>(
        `SELECT ${shortColumns().join(", ")} FROM ${this.qualifiedTable}${where} ORDER BY ${SYMBOL_COLUMN}`,
        params
      );
      return result.rows.map((row) => fromSerializedRow({ ...row, no: row.no ?? "" }));
    } finally {
      client.release();
    }
  }
}

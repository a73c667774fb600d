import { config } from "./shared/config.js";
import { createDatabase } from "./shared/db.js";
import { PgCodesStore } from "./store/codes-store.js";

const run = async () => {
  const db = createDatabase(config.dbUrl);
  try {
    const store = new PgCodesStore({ pool: db.pool, schema: config.dbSchema, table: config.dbTable });
    if (await store.hasTable()) {
      console.log(`Table ${config.dbSchema}.${config.dbTable} already exists.`);
      return;
    }
    await store.provision();
    console.log(`Schema applied to ${config.dbSchema}.${config.dbTable}.`);
  } finally {
    await db.close();
  }
};

run().catch((error) => {
  console.error("Migration failed:", error);
  process.exit(1);
});

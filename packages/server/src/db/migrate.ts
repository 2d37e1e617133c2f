import { config } from "dotenv";
import { migrate } from "drizzle-orm/neon-http/migrator";
import { createDb, MIGRATIONS_FOLDER } from "./db";
import { getEnv } from "../utils/env";

/**
 * 执行 drizzle/ 目录下尚未应用的 SQL 迁移
 */
const run = async () => {
  config();
  const env = getEnv(process.env);
  const db = createDb(env.DATABASE_URL);

  await migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });
  console.log("Migrations applied");
};

run().catch((error) => {
  console.error("Migration failed", error);
  process.exit(1);
});

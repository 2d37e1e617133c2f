import { PGlite } from "@electric-sql/pglite";
import { sql } from "drizzle-orm";
import { drizzle } from "drizzle-orm/pglite";
import { migrate } from "drizzle-orm/pglite/migrator";
import * as schema from "../../db/schema";
import { MIGRATIONS_FOLDER } from "../../db/db";

/**
 * 进程内 PostgreSQL（PGlite），执行与生产相同的 SQL 迁移
 */
export async function createTestDb() {
  const client = new PGlite();
  const db = drizzle(client, { schema });
  await migrate(db, { migrationsFolder: MIGRATIONS_FOLDER });

  return {
    db,
    // 每个用例之间清空数据并重置自增 ID
    reset: async () => {
      await db.execute(sql`TRUNCATE tasks, events, journal_entries RESTART IDENTITY`);
    },
    close: () => client.close(),
  };
}

export type TestDb = Awaited<ReturnType<typeof createTestDb>>;

import { fileURLToPath } from "node:url";
import { drizzle } from "drizzle-orm/neon-http";
import { neon } from "@neondatabase/serverless";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import * as schema from "./schema";

/**
 * SQL 迁移目录（packages/server/drizzle）
 */
export const MIGRATIONS_FOLDER = fileURLToPath(new URL("../../drizzle", import.meta.url));

/**
 * 创建数据库实例:提供统一的数据库实例创建接口，配合中间件实现依赖注入模式。
 * - 使用 Neon HTTP 连接而非 TCP
 * - 创建实例成本低
 *
 * @param databaseUrl - PostgreSQL 连接字符串
 * @returns Drizzle ORM 实例
 */
export function createDb(databaseUrl: string) {
  const sql = neon(databaseUrl);
  return drizzle(sql, { schema });
}

/**
 * 数据库实例类型
 * Service 层只依赖 PostgreSQL 的通用接口，生产环境（neon-http）和测试（PGlite）都满足
 */
export type DbInstance = PgDatabase<PgQueryResultHKT, typeof schema>;

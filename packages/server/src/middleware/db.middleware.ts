import { createMiddleware } from "hono/factory";
import type { DbInstance } from "../db/db";
import type { DbVariables } from "../types/variables";

/**
 * 将数据库实例注入请求上下文，路由通过 c.get("db") 获取
 */
export const createDbMiddleware = (db: DbInstance) =>
  createMiddleware<{
    Variables: DbVariables;
  }>(async (c, next) => {
    c.set("db", db);
    await next();
  });

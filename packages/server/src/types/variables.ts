import type { DbInstance } from "../db/db";

/**
 * 请求上下文变量
 */
export type DbVariables = {
  db: DbInstance;
};

export type AppVariables = DbVariables;

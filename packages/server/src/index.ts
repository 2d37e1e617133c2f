import { Hono } from "hono";
import { logger } from "hono/logger";
import { cors } from "hono/cors";
import type { DbInstance } from "./db/db";
import type { AppVariables } from "./types/variables";
import { createDbMiddleware } from "./middleware/db.middleware";
import tasksRoutes from "./routes/tasks.routes";
import eventsRoutes from "./routes/events.routes";
import journalRoutes from "./routes/journal.routes";
import { errorResponse } from "./utils/route-helpers";
import { ErrorCode, handleServiceError } from "./utils/error-handler";

export interface AppOptions {
  db: DbInstance;
  /** 允许跨域的来源，默认 "*" */
  corsOrigin?: string | string[];
  /** 是否输出请求日志，默认 true */
  logRequests?: boolean;
}

export function createApp({ db, corsOrigin = "*", logRequests = true }: AppOptions) {
  const app = new Hono<{ Variables: AppVariables }>();

  // ==================== 全局中间件 ====================
  if (logRequests) {
    app.use("*", logger());
  }
  app.use("*", cors({ origin: corsOrigin }));
  app.use("*", createDbMiddleware(db));

  // 健康检查端点
  app.get("/health", (c) => {
    return c.json({ status: "ok" });
  });

  // ==================== API 路由 ====================
  app.route("/tasks", tasksRoutes);
  app.route("/events", eventsRoutes);
  app.route("/journal", journalRoutes);

  app.notFound((c) => c.json(errorResponse("Route not found", ErrorCode.NOT_FOUND), 404));
  app.onError((error, c) => handleServiceError(c, error));

  return app;
}

export type App = ReturnType<typeof createApp>;

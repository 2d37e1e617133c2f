import { config } from "dotenv";
import { serve } from "@hono/node-server";
import { createApp } from "./index";
import { createDb } from "./db/db";
import { getCorsOrigin, getEnv, getPort } from "./utils/env";

const bootstrap = () => {
  config();
  const env = getEnv(process.env);
  const app = createApp({
    db: createDb(env.DATABASE_URL),
    corsOrigin: getCorsOrigin(env),
  });

  serve({ fetch: app.fetch, port: getPort(env) }, (info) => {
    console.log(`Planner API listening on port ${info.port}`);
  });
};

try {
  bootstrap();
} catch (error) {
  console.error("Failed to start server", error);
  process.exit(1);
}

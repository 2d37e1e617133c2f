import { type Bindings } from "../types/bindings";

/**
 * 获取并验证环境变量
 *
 * @param env - 进程环境变量（通常是 process.env，已由 dotenv 加载 .env）
 * @returns 验证后的环境变量
 * @throws 如果必需的环境变量缺失或格式不正确
 */
export const getEnv = (env: Record<string, string | undefined>): Bindings => {
  const required: Array<keyof Bindings> = ["DATABASE_URL"];

  const missing: string[] = [];

  for (const key of required) {
    if (!env[key]) {
      missing.push(key);
    }
  }

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(", ")}`);
  }

  if (env.PORT !== undefined && !/^[1-9]\d*$/.test(env.PORT)) {
    throw new Error(`PORT must be a positive integer, got "${env.PORT}"`);
  }

  return {
    DATABASE_URL: env.DATABASE_URL ?? "",
    PORT: env.PORT,
    NODE_ENV: env.NODE_ENV,
    CORS_ORIGIN: env.CORS_ORIGIN,
  };
};

export const DEFAULT_PORT = 3000;

/**
 * 服务监听端口
 */
export const getPort = (env: Bindings): number => (env.PORT ? Number(env.PORT) : DEFAULT_PORT);

/**
 * CORS 允许的来源，逗号分隔；未配置时允许任意来源
 */
export const getCorsOrigin = (env: Bindings): string | string[] => {
  const origins = (env.CORS_ORIGIN ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  if (origins.length === 0) return "*";
  return origins.length === 1 ? origins[0] : origins;
};

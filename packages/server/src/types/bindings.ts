/**
 * 环境变量类型定义
 */
export type Bindings = {
  // PostgreSQL 连接字符串
  DATABASE_URL: string;

  // 服务器配置（可选）
  PORT?: string;
  NODE_ENV?: string;

  // 允许跨域的前端地址，逗号分隔
  CORS_ORIGIN?: string;
};

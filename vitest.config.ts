import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    setupFiles: ["packages/server/src/__tests__/setup.ts"],
    // PGlite 启动并执行迁移需要数秒
    hookTimeout: 30000,
    testTimeout: 15000,
  },
});

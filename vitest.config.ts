import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    env: {
      AMM_LOG_LEVEL: "silent",
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/**/index.ts"],
      thresholds: {
        // Core math modules should have high coverage
        "src/math.ts": {
          statements: 95,
          branches: 85,
          functions: 95,
        },
        "src/pool.ts": {
          statements: 90,
          branches: 80,
          functions: 95,
        },
      },
    },
  },
});

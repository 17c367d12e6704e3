import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    // Logging env is cleared so every run resolves to the silent test level.
    env: {
      CSIM_LOG_LEVEL: "",
      CSIM_DEBUG: "",
      CSIM_LOG_PRETTY: "",
      CSIM_MAX_LINES: "",
    },
    coverage: {
      provider: "v8",
      include: ["src/sim/**/*.ts"],
      exclude: ["src/sim/bin.ts"],
      reporter: ["text", "text-summary", "lcov"],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
        perFile: false,
      },
    },
    pool: "forks",
    testTimeout: 10000,
  },
});

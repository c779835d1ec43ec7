import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    // Each test file opens its own in-memory database
    pool: "forks",
    testTimeout: 30000,
    hookTimeout: 30000,
    env: {
      LOG_LEVEL: "silent",
    },
  },
});

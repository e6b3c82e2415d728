import { defineConfig } from "vitest/config";

const isCI = process.env.CI === "1" || process.env.CI === "true";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["engine/tests/**/*.test.ts"],
    pool: isCI ? "forks" : "threads",
    poolOptions: {
      threads: {
        singleThread: isCI,
      },
      forks: {
        singleFork: true,
      },
    },
    watch: false,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: isCI ? 30000 : 10000,
  },
});

import { defineConfig } from "vitest/config";

/**
 * Vitest configuration. Uses forked processes instead of worker threads.
 */
export default defineConfig({
  test: {
    pool: "forks",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["test/**/*.test.ts"],
    // Tests see defaults regardless of the caller's shell.
    env: {
      ORDER_SYNC_CSV_PATH: "",
      ORDER_SYNC_DB_PATH: "",
      ORDER_SYNC_EXPORT_PATH: "",
      ORDER_SYNC_MODE: "",
      ORDER_SYNC_LOG_LEVEL: "",
      ORDER_SYNC_DEBUG: "",
    },
    // better-sqlite3 handles stay per-process.
    pool: "forks",
    testTimeout: 10000,
  },
});

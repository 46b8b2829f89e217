import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["shared/src/**/__tests__/**/*.test.ts", "backend/src/**/__tests__/**/*.test.ts"],
    // better-sqlite3 is a native addon; run test files in child processes
    pool: "forks",
    env: {
      STUDY_LOOP_QUIET: "1",
      TZ: "UTC",
    },
  },
});

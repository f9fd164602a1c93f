// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Engine runs are synchronous and in-process
    testTimeout: 20_000,
    pool: "threads",
    include: ["test/**/*.spec.ts"],
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    // Attempts restore process.cwd() with process.chdir, which worker threads reject.
    pool: "forks",
    testTimeout: 30_000,
  },
});

import { defineConfig } from "vitest/config";
import path from "path";

export default defineConfig({
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "./src"),
    },
  },
  test: {
    include: ["tests/**/*.test.ts"],
    pool: "threads",
    // Each integration file boots its own in-process Postgres; running them
    // one at a time keeps memory bounded.
    fileParallelism: false,
    testTimeout: 20000,
    hookTimeout: 30000,
  },
});

import path from "node:path";

import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@harvest-hub/core": path.resolve(__dirname, "packages/core/src/index.ts"),
      "@harvest-hub/db": path.resolve(__dirname, "packages/db/src/index.ts")
    }
  },
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    environment: "node",
    pool: "forks"
  }
});

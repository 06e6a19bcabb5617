import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Package-level configs exist for running a single package; this one covers the monorepo.
    include: ["packages/**/src/**/*.test.ts"],
    environment: "node",
    env: { LOG_LEVEL: "silent" },
  },
});

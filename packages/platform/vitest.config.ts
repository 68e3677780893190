/**
 * Vitest Configuration: @procflow/platform
 *
 * Unit tests for the process engine. Nothing here needs a database:
 * persistence is tested through the in-memory store and a recording
 * SQL executor.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});

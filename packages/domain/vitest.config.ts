/**
 * Vitest Configuration: @procflow/domain
 *
 * Tests for domain process definitions.
 * Validates that process structures conform to the contracts.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});

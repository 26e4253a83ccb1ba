/**
 * Vitest Configuration: @adminforge/contracts
 *
 * Pure TypeScript tests. No network, no database.
 * These tests cover the codename and content type helpers.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});

/**
 * Vitest Configuration: @adminforge/domain
 *
 * Tests for the example resources, their actions and the seed data.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});

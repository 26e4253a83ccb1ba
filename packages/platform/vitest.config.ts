/**
 * Vitest Configuration: @adminforge/platform
 *
 * Unit tests for the admin engine. Everything runs in process: the
 * memory adapter and memory stores stand in for a database.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});

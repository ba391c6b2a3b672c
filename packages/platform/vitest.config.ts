/**
 * Vitest Configuration — @foodvote/platform
 *
 * Unit tests for the platform engine.
 * Nothing here needs a running database: services and routes are
 * exercised against the in-memory repositories in src/testing.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});

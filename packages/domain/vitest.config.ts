/**
 * Vitest Configuration — @foodvote/domain
 *
 * Schema tests for entity create/update/read shapes.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});

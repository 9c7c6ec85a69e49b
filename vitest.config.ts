import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    setupFiles: ["tests/setup.ts"],
    environment: "node",
    // Full-size pages are 2550×3300 RGBA; rendering and encoding one takes a moment.
    testTimeout: 30000,
  },
});

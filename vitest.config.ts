import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // The CMU table takes a moment to import on cold runs.
    testTimeout: 20_000,
  },
});

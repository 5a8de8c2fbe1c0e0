import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    // Several suites create temporary directory trees
    testTimeout: 20_000,
    typecheck: {
      enabled: false,
    },
  },
});

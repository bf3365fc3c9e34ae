import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 30_000,
    env: { CODEWARD_QUIET: "1" },
  },
});

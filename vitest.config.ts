import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["ml/**/*.test.ts", "mcp/**/*.test.ts", "tests/**/*.test.ts"],
    testTimeout: 15_000,
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    root: ".",
    include: ["engine/tests/**/*.test.ts", "cli/tests/**/*.test.ts", "backend/tests/**/*.test.ts"],
    globals: false,
    testTimeout: 10000,
  },
});

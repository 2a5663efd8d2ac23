import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true, // Use global APIs like describe, it, expect
    environment: "node",
    testTimeout: 15000,
    include: ["test/**/*.test.ts"],
  },
});

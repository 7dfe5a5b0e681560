import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts", "index.test.ts"],
    environment: "node",
    testTimeout: 10_000,
  },
});

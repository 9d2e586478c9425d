import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    poolOptions: { forks: { maxForks: 4 } },
    testTimeout: 10_000,
  },
});

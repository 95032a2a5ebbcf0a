import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 10_000,
    hookTimeout: 10_000,
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: [
        "packages/*/src/**/__tests__/**",
        "packages/*/src/**/index.ts",
        "packages/test-utils/**",
      ],
      reporter: ["text", "json", "clover"],
      reportsDirectory: "coverage",
    },
  },
});

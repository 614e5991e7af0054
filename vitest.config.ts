import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    isolate: true,
    restoreMocks: true,
    clearMocks: true,
    environment: "node",
    include: ["src/**/*.{test,spec}.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "lcov"],
      include: ["src/**/*.ts"],
      exclude: ["**/*.test.ts", "**/*.test-utils.ts", "**/*.state-mock.ts"],
      thresholds: {
        lines: 80,
        branches: 80,
        functions: 80,
        statements: 80,
      },
    },
  },
});

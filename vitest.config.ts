import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Environment settings
    environment: "node",

    // Test file patterns
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**"],

    // Coverage settings
    coverage: {
      provider: "v8",
      reporter: ["text", "html"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/**/__tests__/**"],
      all: true,
      thresholds: {
        statements: 90,
        branches: 85,
        functions: 90,
        lines: 90,
      },
    },

    testTimeout: 10000,

    globals: false,
    watch: false,
  },
});

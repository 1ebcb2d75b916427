import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // The lock binding is a native add-on; run each file in its own process
    pool: "forks",

    // Test file patterns
    include: ["tests/**/*.test.ts"],
    exclude: ["node_modules", "dist", "coverage"],

    // Timeout configuration
    testTimeout: 30000, // 30 seconds for multi-process tests
    hookTimeout: 10000,

    coverage: {
      reporter: ["text", "json", "html", "lcov"],
      include: ["src/**/*.ts"],
      exclude: ["dist/**", "coverage/**"],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },

    environment: "node",
    reporters: ["default"],
    globals: false,
    slowTestThreshold: 5000,
  },
});

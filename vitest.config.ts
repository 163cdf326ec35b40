// =============================================================================
// Vitest Configuration
// https://vitest.dev/config/
// =============================================================================

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // =========================================================================
    // Environment Configuration
    // =========================================================================
    environment: "node",
    globals: true,

    // =========================================================================
    // Test File Patterns
    // =========================================================================
    include: ["tests/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist", "coverage"],

    // =========================================================================
    // Coverage Configuration
    // Enabled with `npm run test:coverage`
    // =========================================================================
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      reportsDirectory: "./coverage",
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/*.d.ts",
        "src/types/**",
        "src/index.ts", // CLI entry point
        "src/**/index.ts", // Re-export modules
      ],
      thresholds: {
        branches: 80,
        functions: 85,
        lines: 85,
        statements: 85,
      },
    },

    // =========================================================================
    // Test Isolation and Cleanup
    // =========================================================================
    clearMocks: true,
    restoreMocks: true,
    mockReset: true,

    // Randomize test order to catch order-dependent tests
    sequence: {
      shuffle: true,
    },

    watch: false,

    // =========================================================================
    // Console Output Handling
    // =========================================================================
    onConsoleLog(log, type) {
      if (type === "stderr" && log.includes("Error:")) {
        return false;
      }
      return true;
    },
  },
});

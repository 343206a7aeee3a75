import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    setupFiles: ["./tests/setup.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html", "lcov", "json-summary"],
      exclude: [
        "node_modules/",
        "dist/",
        "**/*.config.ts",
        "**/*.d.ts",
        "tests/",
        "docs/",
        "**/*.test.ts",
        "src/index.ts",
      ],
      include: ["src/**/*.ts"],
      all: true,
      thresholds: {
        "src/core/**/*.ts": {
          branches: 70,
          functions: 80,
          lines: 80,
          statements: 80,
        },
        "src/config/**/*.ts": {
          branches: 60,
          functions: 60,
          lines: 60,
          statements: 60,
        },
      },
    },
    testTimeout: 30000,
    hookTimeout: 30000,
    isolate: true,
    mockReset: true,
    restoreMocks: true,
    clearMocks: true,
  },
});

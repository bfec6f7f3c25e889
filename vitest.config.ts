import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "node",
    globals: true,
    environment: "node",
    // The library treats an unset or empty NODE_ENV as production.
    env: { NODE_ENV: "test" },
    include: ["tests/**/*.{test,spec}.ts"],
    coverage: {
      provider: "v8" as const,
      reporter: ["text", "json", "html", "lcov"],
      include: ["src/**"],
      exclude: ["**/*.d.ts", "src/data/**"],
      all: true,
      thresholds: {
        branches: 80,
        functions: 80,
        lines: 80,
        statements: 80,
      },
    },
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts", "tests/**/*.test.ts"],
    testTimeout: 10_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      // Track boundary coverage, not line coverage
      include: [
        "src/filters/engine.ts",
        "src/matcher/matcher.ts",
        "src/dispatch/dispatcher.ts",
        "src/service/relay-service.ts",
        "src/server/handlers.ts",
      ],
      exclude: [
        "src/**/__tests__/**",
        "src/schemas/**",
      ],
    },
  },
});

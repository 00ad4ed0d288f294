import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: [
      "packages/*/src/**/*.test.ts",
      "services/*/src/**/*.test.ts",
    ],
    reporters: ["default"],
    coverage: {
      reporter: ["text", "lcov"],
      enabled: process.env.CI === "true" || process.env.COVERAGE === "true",
    },
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "waypoint-fsm",
    environment: "node",
    include: [
      "packages/*/tests/unit/**/*.test.ts",
      "packages/*/tests/steps/**/*.steps.ts", // Gherkin step files
    ],
    testTimeout: 30000,
    hookTimeout: 15000,
  },
});

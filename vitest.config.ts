import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: [
      "resilience/tests/**/*.{test,spec}.ts",
      "web-runner/tests/**/*.{test,spec}.ts",
    ],
  },
});

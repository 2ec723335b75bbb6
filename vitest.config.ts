import { defineConfig } from "vitest/config";

// Test runner for every workspace package
export default defineConfig({
  test: {
    include: ["*/tests/**/*.spec.ts"],
    environment: "node",
  },
});

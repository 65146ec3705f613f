import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    // Load workspace packages from their TypeScript sources
    conditions: ["source"],
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 20000,
  },
});

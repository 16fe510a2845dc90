import { defineConfig } from "vitest/config";

/**
 * Unit tests only. The Playwright suites under tests/ need browsers and run
 * through `npm run test:e2e`.
 */
export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules", "dist", "tests/**"],
    testTimeout: 10_000,
  },
});

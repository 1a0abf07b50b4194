import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/src/**/*.spec.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 30000,
    clearMocks: true,
    restoreMocks: true,
    env: {
      SWITCHYARD_LOG_LEVEL: "silent",
    },
  },
});

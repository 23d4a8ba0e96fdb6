import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["services/*/tests/**/*.test.ts", "packages/*/tests/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
      AUTH_SECRET: "test-secret-for-vitest-runs",
      EXPOSE_DEV_TOKENS: "true",
    },
  },
});

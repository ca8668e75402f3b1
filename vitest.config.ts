import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: ["packages/*/vitest.config.ts"],

    exclude: ["**/node_modules/**", "**/dist/**"],

    pool: "forks",

    typecheck: {
      enabled: false,
    },

    testTimeout: 30000,
  },
});

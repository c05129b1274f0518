import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.{ts,tsx}", "apps/*/test/**/*.test.{ts,tsx}"],
    globals: false,
    environment: "node",
    testTimeout: 10000,
  },
  esbuild: {
    jsx: "automatic",
  },
});

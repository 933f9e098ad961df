import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["apps/*/src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "error",
    },
  },
});

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    globals: true,
    environment: "node",
    env: {
      LOG_LEVEL: "error",
    },
    coverage: {
      provider: "v8",
      include: ["src/**"],
    },
  },
});

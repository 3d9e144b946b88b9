import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    env: {
      // Keep pino quiet in test output; individual tests opt in with their own logger.
      LOG_LEVEL: "silent",
    },
  },
});

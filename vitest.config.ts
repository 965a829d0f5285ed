import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    env: {
      // Keep test output free of log lines
      CHATBOT_I18N_LOG_FORMAT: "hidden",
    },
  },
});

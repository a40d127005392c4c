import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["bot/**/*.test.ts"],
    environment: "node",
    env: {
      DB_PATH: ":memory:",
      LOG_LEVEL: "error",
      TELEGRAM_BOT_TOKEN: "test-token",
      TELEGRAM_CHAT_IDS: "1001,1002",
      SPORTS_API_KEY: "test-key",
    },
  },
});

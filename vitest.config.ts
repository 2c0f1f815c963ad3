import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    env: {
      OPENAI_API_KEY: "test-key-not-real",
      OPENAI_BASE_URL: "http://upstream.test/v1",
      MODEL: "test-default-model",
      NODE_ENV: "test",
      LOG_LEVEL: "error",
    },
  },
});

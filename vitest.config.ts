import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    env: {
      API_HOST: "127.0.0.1",
      API_PORT: "3333",
      API_RATE_LIMIT_MAX: "1000",
      LOG_LEVEL: "error",
      NODE_ENV: "test",
      REDIS_URL: "redis://127.0.0.1:6379",
      DEFAULT_TIMEZONE: "UTC",
      LLM_PROVIDER: "local",
      LOCAL_LLM_URL: "http://127.0.0.1:9999/v1/triage",
      LOCAL_LLM_MODEL: "test-model",
      LLM_TIMEOUT_MS: "1000",
      VERIFY_OUTPUT: "true",
    },
    testTimeout: 30000,
    setupFiles: ["./tests/setup.ts"],
    include: ["tests/**/*.test.ts"],
  },
});

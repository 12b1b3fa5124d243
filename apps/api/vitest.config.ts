import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    isolate: true,
    sequence: {
      concurrent: false
    },
    env: {
      NODE_ENV: "test",
      APP_NAME: "Storefront API",
      STORE_DRIVER: "memory",
      CORS_ORIGIN: "*",
      JWT_SECRET: "test-secret-for-admin-tokens",
      BCRYPT_ROUNDS: "4",
      WEBHOOK_TIMEOUT_MS: "1500"
    }
  }
});

import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { connectDatabase } from "./db/connect.js";
import { WebhookDispatcher, createHttpTransport } from "./services/webhookDispatcher.js";

const store = await connectDatabase();
const webhooks = new WebhookDispatcher(store, createHttpTransport(), env.WEBHOOK_TIMEOUT_MS);

const app = createApp({ store, webhooks });
const server = app.listen(env.PORT, () => {
  console.log(`[api] ${env.APP_NAME} running on http://localhost:${env.PORT} (store: ${env.STORE_DRIVER})`);
});

function shutdown(signal: NodeJS.Signals) {
  console.log(`[api] ${signal} received, shutting down`);
  server.close(() => {
    store
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error("[api] failed to close store", error);
        process.exit(1);
      });
  });
}

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);

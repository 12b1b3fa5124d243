import cors from "cors";
import express from "express";
import helmet from "helmet";
import morgan from "morgan";
import { env } from "./config/env.js";
import { AppError } from "./lib/errors.js";
import { createRouter } from "./router.js";
import { systemRouter } from "./modules/system.js";
import type { EventNotifier } from "./services/webhookDispatcher.js";
import type { DocumentStore } from "./store/types.js";

export type AppDependencies = {
  store: DocumentStore;
  webhooks: EventNotifier;
};

function isMalformedJson(err: unknown) {
  return err instanceof SyntaxError && "body" in err;
}

export function createApp(deps: AppDependencies) {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: env.CORS_ORIGIN === "*" ? "*" : env.CORS_ORIGIN.split(",") }));
  app.use(express.json({ limit: "1mb" }));
  if (env.NODE_ENV !== "test") {
    app.use(morgan("dev"));
  }

  app.use(systemRouter(deps));
  app.use("/api", createRouter(deps));

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof AppError) {
      res.status(err.status).json({ message: err.message, code: err.code, ...(err.issues ? { issues: err.issues } : {}) });
      return;
    }
    if (isMalformedJson(err)) {
      res.status(400).json({ message: "Malformed JSON body", code: "InvalidInput" });
      return;
    }

    console.error("[api] unhandled error", err);
    res.status(500).json({ message: "Internal server error", detail: err instanceof Error ? err.message : String(err) });
  });

  return app;
}

import { Router } from "express";
import type { AppDependencies } from "../app.js";
import { env } from "../config/env.js";
import { collectionNames, describeFields, describeIndexes } from "../models/index.js";

const MAX_LISTED_COLLECTIONS = 10;

export function systemRouter({ store }: AppDependencies) {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({ name: env.APP_NAME, status: "ok" });
  });

  router.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok", service: "api", timestamp: new Date().toISOString() });
  });

  // Connectivity problems are reported in the body so the probe itself stays 200.
  router.get("/test", async (_req, res) => {
    try {
      const diagnostics = await store.diagnostics();
      res.json({
        backend: "ok",
        database: diagnostics.driver,
        database_name: diagnostics.databaseName,
        connection_status: diagnostics.connected ? "connected" : "disconnected",
        collections: diagnostics.collections.slice(0, MAX_LISTED_COLLECTIONS)
      });
    } catch (error) {
      console.error("[api] diagnostics failed", error);
      res.json({
        backend: "ok",
        database: "unavailable",
        database_name: null,
        connection_status: `error: ${error instanceof Error ? error.message : String(error)}`,
        collections: []
      });
    }
  });

  router.get("/schema", (_req, res) => {
    const schema = Object.fromEntries(
      collectionNames.map((name) => [name, { fields: describeFields(name), indexes: describeIndexes(name) }])
    );
    res.json(schema);
  });

  return router;
}

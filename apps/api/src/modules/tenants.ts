import { Router } from "express";
import { tenantListQuerySchema, tenantSchema } from "@storefront/shared-types";
import type { AppDependencies } from "../app.js";
import { parseInput } from "../lib/errors.js";
import { toPublic } from "../lib/serialize.js";

export function tenantsRouter({ store }: AppDependencies) {
  const router = Router();

  router.post("/", async (req, res) => {
    const tenant = parseInput(tenantSchema, req.body, "Invalid tenant payload");
    const id = await store.insert("tenant", tenant);
    res.json({ id });
  });

  router.get("/", async (req, res) => {
    const { limit } = parseInput(tenantListQuerySchema, req.query, "Invalid tenant query");
    const rows = await store.find("tenant", {}, limit);
    res.json(rows.map(toPublic));
  });

  return router;
}

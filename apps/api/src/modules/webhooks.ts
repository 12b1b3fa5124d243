import { Router } from "express";
import { activeListQuerySchema, webhookSchema } from "@storefront/shared-types";
import type { AppDependencies } from "../app.js";
import { parseInput } from "../lib/errors.js";
import { toPublic } from "../lib/serialize.js";
import { assertTenantExists } from "../services/tenant.js";
import type { Filter } from "../store/types.js";

const webhookListQuerySchema = activeListQuerySchema(50);

export function webhooksRouter({ store }: AppDependencies) {
  const router = Router();

  router.post("/", async (req, res) => {
    const webhook = parseInput(webhookSchema, req.body, "Invalid webhook payload");
    await assertTenantExists(store, webhook.tenant_id);
    const id = await store.insert("webhook", webhook);
    res.json({ id });
  });

  router.get("/", async (req, res) => {
    const query = parseInput(webhookListQuerySchema, req.query, "Invalid webhook query");
    const filter: Filter = { tenant_id: query.tenant_id };
    if (query.active !== undefined) {
      filter.active = query.active;
    }
    const rows = await store.find("webhook", filter, query.limit);
    res.json(rows.map(toPublic));
  });

  return router;
}

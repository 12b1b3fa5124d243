import { Router } from "express";
import { customerSchema, searchListQuerySchema } from "@storefront/shared-types";
import type { AppDependencies } from "../app.js";
import { parseInput } from "../lib/errors.js";
import { containsInsensitive } from "../lib/search.js";
import { toPublic } from "../lib/serialize.js";
import { assertTenantExists } from "../services/tenant.js";
import type { Filter } from "../store/types.js";

const customerListQuerySchema = searchListQuerySchema(100);

export function customersRouter({ store }: AppDependencies) {
  const router = Router();

  router.post("/", async (req, res) => {
    const customer = parseInput(customerSchema, req.body, "Invalid customer payload");
    await assertTenantExists(store, customer.tenant_id);
    const id = await store.insert("customer", customer);
    res.json({ id });
  });

  router.get("/", async (req, res) => {
    const query = parseInput(customerListQuerySchema, req.query, "Invalid customer query");
    const filter: Filter = { tenant_id: query.tenant_id };
    if (query.q) {
      filter.name = containsInsensitive(query.q);
    }
    const rows = await store.find("customer", filter, query.limit);
    res.json(rows.map(toPublic));
  });

  return router;
}

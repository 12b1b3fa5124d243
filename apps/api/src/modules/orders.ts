import { Router } from "express";
import { orderCreateSchema, orderListQuerySchema } from "@storefront/shared-types";
import type { AppDependencies } from "../app.js";
import { parseInput } from "../lib/errors.js";
import { toPublic } from "../lib/serialize.js";
import { placeOrder } from "../services/orders.js";
import type { Filter } from "../store/types.js";

export function ordersRouter(deps: AppDependencies) {
  const router = Router();

  router.post("/", async (req, res) => {
    const input = parseInput(orderCreateSchema, req.body, "Invalid order payload");
    const placed = await placeOrder(deps, input);
    res.json(placed);
  });

  router.get("/", async (req, res) => {
    const query = parseInput(orderListQuerySchema, req.query, "Invalid order query");
    const filter: Filter = { tenant_id: query.tenant_id };
    if (query.status) {
      filter.status = query.status;
    }
    const rows = await deps.store.find("order", filter, query.limit);
    res.json(rows.map(toPublic));
  });

  return router;
}

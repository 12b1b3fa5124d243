import { Router } from "express";
import {
  productSchema,
  searchListQuerySchema,
  stockAdjustmentSchema,
  tenantScopedQuerySchema
} from "@storefront/shared-types";
import type { AppDependencies } from "../app.js";
import { AppError, parseInput } from "../lib/errors.js";
import { storedProductSchema } from "../lib/records.js";
import { containsInsensitive } from "../lib/search.js";
import { toPublic } from "../lib/serialize.js";
import { assertTenantExists } from "../services/tenant.js";
import type { Filter } from "../store/types.js";
import { parseId } from "../utils/ids.js";

const productListQuerySchema = searchListQuerySchema(100);

export function productsRouter({ store }: AppDependencies) {
  const router = Router();

  router.post("/", async (req, res) => {
    const product = parseInput(productSchema, req.body, "Invalid product payload");
    await assertTenantExists(store, product.tenant_id);
    const id = await store.insert("product", product);
    res.json({ id });
  });

  router.get("/", async (req, res) => {
    const query = parseInput(productListQuerySchema, req.query, "Invalid product query");
    const filter: Filter = { tenant_id: query.tenant_id };
    if (query.q) {
      filter.title = containsInsensitive(query.q);
    }
    const rows = await store.find("product", filter, query.limit);
    res.json(rows.map(toPublic));
  });

  router.get("/:id", async (req, res) => {
    const { tenant_id } = parseInput(tenantScopedQuerySchema, req.query, "Invalid product query");
    const product = await store.findOne("product", { _id: parseId(String(req.params.id), "product id"), tenant_id });
    if (!product) {
      throw new AppError("NotFound", "Product not found");
    }
    res.json(toPublic(product));
  });

  router.patch("/:id/stock", async (req, res) => {
    const { tenant_id } = parseInput(tenantScopedQuerySchema, req.query, "Invalid product query");
    const { delta } = parseInput(stockAdjustmentSchema, req.body, "Invalid stock adjustment");
    const productId = parseId(String(req.params.id), "product id");

    const row = await store.findOne("product", { _id: productId, tenant_id });
    if (!row) {
      throw new AppError("NotFound", "Product not found");
    }
    const product = storedProductSchema.parse(row);

    const filter: Filter = { _id: productId, tenant_id };
    if (delta < 0) {
      filter.stock = { $gte: -delta };
    }
    const result = await store.updateOne("product", filter, { $inc: { stock: delta } });
    if (result.matched === 0) {
      throw new AppError("InsufficientStock", `Insufficient stock for ${product.title}`);
    }

    const updated = await store.findOne("product", { _id: productId, tenant_id });
    const stock = updated ? storedProductSchema.parse(updated).stock : product.stock + delta;
    res.json({ id: productId, stock });
  });

  return router;
}

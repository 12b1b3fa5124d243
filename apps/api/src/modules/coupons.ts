import { Router } from "express";
import { activeListQuerySchema, couponSchema } from "@storefront/shared-types";
import type { AppDependencies } from "../app.js";
import { AppError, parseInput } from "../lib/errors.js";
import { toPublic } from "../lib/serialize.js";
import { assertTenantExists } from "../services/tenant.js";
import { DuplicateKeyError, type Filter } from "../store/types.js";

const couponListQuerySchema = activeListQuerySchema(50);

export function couponsRouter({ store }: AppDependencies) {
  const router = Router();

  router.post("/", async (req, res) => {
    const coupon = parseInput(couponSchema, req.body, "Invalid coupon payload");
    await assertTenantExists(store, coupon.tenant_id);

    const existing = await store.count("coupon", { tenant_id: coupon.tenant_id, code: coupon.code }, 1);
    if (existing > 0) {
      throw new AppError("DuplicateCoupon", "Coupon code already exists");
    }

    try {
      const id = await store.insert("coupon", coupon);
      res.json({ id });
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        throw new AppError("DuplicateCoupon", "Coupon code already exists");
      }
      throw error;
    }
  });

  router.get("/", async (req, res) => {
    const query = parseInput(couponListQuerySchema, req.query, "Invalid coupon query");
    const filter: Filter = { tenant_id: query.tenant_id };
    if (query.active !== undefined) {
      filter.active = query.active;
    }
    const rows = await store.find("coupon", filter, query.limit);
    res.json(rows.map(toPublic));
  });

  return router;
}

import { Router } from "express";
import type { AppDependencies } from "./app.js";
import { optionalAuth } from "./middleware/auth.js";
import { adminAuthRouter } from "./modules/adminAuth.js";
import { couponsRouter } from "./modules/coupons.js";
import { customersRouter } from "./modules/customers.js";
import { ordersRouter } from "./modules/orders.js";
import { productsRouter } from "./modules/products.js";
import { tenantsRouter } from "./modules/tenants.js";
import { themeRouter } from "./modules/theme.js";
import { webhooksRouter } from "./modules/webhooks.js";

export function createRouter(deps: AppDependencies) {
  const router = Router();

  router.use(optionalAuth);

  router.use("/tenants", tenantsRouter(deps));
  router.use("/products", productsRouter(deps));
  router.use("/customers", customersRouter(deps));
  router.use("/coupons", couponsRouter(deps));
  router.use("/webhooks", webhooksRouter(deps));
  router.use("/orders", ordersRouter(deps));
  router.use("/theme", themeRouter(deps));
  router.use("/admin", adminAuthRouter(deps));

  return router;
}

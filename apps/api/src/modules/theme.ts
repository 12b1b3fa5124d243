import { Router } from "express";
import { tenantScopedQuerySchema, themeDefaults, themeSettingsSchema } from "@storefront/shared-types";
import type { AppDependencies } from "../app.js";
import { AppError, parseInput } from "../lib/errors.js";
import { storedThemeSettingsSchema } from "../lib/records.js";
import { toPublic } from "../lib/serialize.js";
import { assertTenantExists } from "../services/tenant.js";

export function themeRouter({ store }: AppDependencies) {
  const router = Router();

  router.get("/", async (req, res) => {
    const { tenant_id } = parseInput(tenantScopedQuerySchema, req.query, "Invalid theme query");
    const row = await store.findOne("theme_settings", { tenant_id });
    if (!row) {
      res.json({ tenant_id, ...themeDefaults });
      return;
    }
    res.json(toPublic(storedThemeSettingsSchema.parse(row)));
  });

  router.post("/", async (req, res) => {
    const settings = parseInput(themeSettingsSchema, req.body, "Invalid theme payload");
    await assertTenantExists(store, settings.tenant_id);

    await store.updateOne("theme_settings", { tenant_id: settings.tenant_id }, { $set: settings }, { upsert: true });

    const row = await store.findOne("theme_settings", { tenant_id: settings.tenant_id });
    if (!row) {
      throw new AppError("NotFound", "Theme settings not found");
    }
    res.json(toPublic(storedThemeSettingsSchema.parse(row)));
  });

  return router;
}

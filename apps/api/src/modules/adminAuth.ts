import { Router } from "express";
import { adminLoginSchema, adminRegisterSchema } from "@storefront/shared-types";
import type { AppDependencies } from "../app.js";
import { AppError, parseInput } from "../lib/errors.js";
import { storedAdminUserSchema } from "../lib/records.js";
import { requireAdmin, type AuthRequest } from "../middleware/auth.js";
import { assertTenantExists } from "../services/tenant.js";
import { DuplicateKeyError } from "../store/types.js";
import { digestPassword, verifyPassword } from "../utils/hash.js";
import { signAdminToken } from "../utils/tokens.js";

const duplicateUser = () => new AppError("DuplicateUser", "Email is already registered for this tenant");

export function adminAuthRouter({ store }: AppDependencies) {
  const router = Router();

  router.post("/register", async (req, res) => {
    const payload = parseInput(adminRegisterSchema, req.body, "Invalid registration payload");
    await assertTenantExists(store, payload.tenant_id);

    const existing = await store.count("admin_user", { tenant_id: payload.tenant_id, email: payload.email }, 1);
    if (existing > 0) {
      throw duplicateUser();
    }

    const passwordHash = await digestPassword(payload.password);
    try {
      const id = await store.insert("admin_user", {
        tenant_id: payload.tenant_id,
        email: payload.email,
        password_hash: passwordHash,
        role: payload.role
      });
      res.json({ id, email: payload.email, role: payload.role });
    } catch (error) {
      if (error instanceof DuplicateKeyError) {
        throw duplicateUser();
      }
      throw error;
    }
  });

  router.post("/login", async (req, res) => {
    const payload = parseInput(adminLoginSchema, req.body, "Invalid login payload");
    const row = await store.findOne("admin_user", { tenant_id: payload.tenant_id, email: payload.email });
    const user = row ? storedAdminUserSchema.parse(row) : null;

    if (!user || !(await verifyPassword(payload.password, user.password_hash))) {
      throw new AppError("Unauthorized", "Invalid credentials");
    }

    const claims = { tenant_id: user.tenant_id, email: user.email, role: user.role };
    res.json({ token: signAdminToken(claims), ...claims });
  });

  router.get("/me", requireAdmin, (req: AuthRequest, res) => {
    res.json(req.claims);
  });

  return router;
}

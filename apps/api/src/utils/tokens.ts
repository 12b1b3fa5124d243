import jwt from "jsonwebtoken";
import { adminClaimsSchema, type AdminClaims } from "@storefront/shared-types";
import { env } from "../config/env.js";

export function signAdminToken(claims: AdminClaims) {
  return jwt.sign(
    { tenant_id: claims.tenant_id, email: claims.email, role: claims.role },
    env.JWT_SECRET,
    { expiresIn: "12h" }
  );
}

export function verifyAdminToken(token: string): AdminClaims {
  return adminClaimsSchema.parse(jwt.verify(token, env.JWT_SECRET));
}

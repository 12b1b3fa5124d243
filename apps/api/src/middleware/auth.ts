import type { NextFunction, Request, Response } from "express";
import type { AdminClaims } from "@storefront/shared-types";
import { verifyAdminToken } from "../utils/tokens.js";

export type AuthRequest = Request & { claims?: AdminClaims };

function parseBearerToken(authorizationHeader?: string) {
  if (!authorizationHeader || !authorizationHeader.startsWith("Bearer ")) {
    return null;
  }
  return authorizationHeader.slice("Bearer ".length);
}

export function optionalAuth(req: AuthRequest, _res: Response, next: NextFunction) {
  const token = parseBearerToken(req.header("authorization"));
  if (!token) {
    next();
    return;
  }

  try {
    req.claims = verifyAdminToken(token);
  } catch {
    req.claims = undefined;
  }

  next();
}

export function requireAdmin(req: AuthRequest, res: Response, next: NextFunction) {
  if (!req.claims) {
    res.status(401).json({ message: "Admin authentication required", code: "Unauthorized" });
    return;
  }

  next();
}

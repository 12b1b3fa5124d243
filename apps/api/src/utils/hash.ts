import bcrypt from "bcryptjs";
import { env } from "../config/env.js";

export async function digestPassword(password: string) {
  return bcrypt.hash(password, env.BCRYPT_ROUNDS);
}

export async function verifyPassword(password: string, digest: string | null | undefined) {
  if (!digest) {
    return false;
  }
  return bcrypt.compare(password, digest);
}

import { Schema } from "mongoose";

export const adminUserSchema = new Schema(
  {
    tenant_id: { type: String, required: true },
    email: { type: String, required: true },
    password_hash: { type: String, required: true },
    role: { type: String, enum: ["owner", "staff"], default: "owner" }
  },
  { collection: "admin_user", versionKey: false }
);

adminUserSchema.index({ tenant_id: 1, email: 1 }, { unique: true });

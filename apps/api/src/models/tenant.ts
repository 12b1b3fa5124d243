import { Schema } from "mongoose";

export const tenantSchema = new Schema(
  {
    name: { type: String, required: true },
    domain: { type: String, default: null, index: true },
    plan: { type: String, default: "free" },
    contact_email: { type: String, default: null }
  },
  { collection: "tenant", versionKey: false }
);

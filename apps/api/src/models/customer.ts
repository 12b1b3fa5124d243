import { Schema } from "mongoose";

export const customerSchema = new Schema(
  {
    tenant_id: { type: String, required: true },
    name: { type: String, required: true },
    email: { type: String, required: true }
  },
  { collection: "customer", versionKey: false }
);

customerSchema.index({ tenant_id: 1, email: 1 });

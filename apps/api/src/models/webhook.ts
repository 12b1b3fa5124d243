import { Schema } from "mongoose";

export const webhookSchema = new Schema(
  {
    tenant_id: { type: String, required: true, index: true },
    url: { type: String, required: true },
    events: { type: [String], default: [] },
    active: { type: Boolean, default: true }
  },
  { collection: "webhook", versionKey: false }
);

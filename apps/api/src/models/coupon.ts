import { Schema } from "mongoose";

export const couponSchema = new Schema(
  {
    tenant_id: { type: String, required: true },
    code: { type: String, required: true },
    percent_off: { type: Number, default: null, min: 0, max: 100 },
    amount_off: { type: Number, default: null, min: 0 },
    active: { type: Boolean, default: true },
    max_redemptions: { type: Number, default: null },
    times_redeemed: { type: Number, default: 0, min: 0 }
  },
  { collection: "coupon", versionKey: false }
);

couponSchema.index({ tenant_id: 1, code: 1 }, { unique: true });

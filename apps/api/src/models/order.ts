import { Schema } from "mongoose";

const orderItemSchema = new Schema(
  {
    product_id: { type: String, required: true },
    quantity: { type: Number, required: true, min: 1 },
    price: { type: Number, required: true, min: 0 },
    title: { type: String, default: null }
  },
  { _id: false }
);

export const orderSchema = new Schema(
  {
    tenant_id: { type: String, required: true },
    customer_id: { type: String, default: null },
    customer_name: { type: String, default: null },
    customer_email: { type: String, default: null },
    items: { type: [orderItemSchema], default: [] },
    subtotal: { type: Number, required: true, min: 0 },
    discount: { type: Number, default: 0, min: 0 },
    coupon_code: { type: String, default: null },
    total: { type: Number, required: true, min: 0 },
    status: {
      type: String,
      enum: ["pending", "paid", "shipped", "cancelled", "refunded"],
      default: "pending"
    }
  },
  { collection: "order", versionKey: false }
);

orderSchema.index({ tenant_id: 1, status: 1 });

import { Schema } from "mongoose";

export const productSchema = new Schema(
  {
    tenant_id: { type: String, required: true, index: true },
    title: { type: String, required: true },
    description: { type: String, default: null },
    price: { type: Number, required: true, min: 0 },
    image: { type: String, default: null },
    stock: { type: Number, default: 0, min: 0 },
    category: { type: String, default: null },
    is_active: { type: Boolean, default: true }
  },
  { collection: "product", versionKey: false }
);

productSchema.index({ tenant_id: 1, title: 1 });

import type { Schema } from "mongoose";
import { adminUserSchema } from "./adminUser.js";
import { couponSchema } from "./coupon.js";
import { customerSchema } from "./customer.js";
import { orderSchema } from "./order.js";
import { productSchema } from "./product.js";
import { tenantSchema } from "./tenant.js";
import { themeSettingsSchema } from "./themeSettings.js";
import { webhookSchema } from "./webhook.js";

export type CollectionName =
  | "tenant"
  | "product"
  | "customer"
  | "order"
  | "coupon"
  | "admin_user"
  | "webhook"
  | "theme_settings";

export type CollectionDefinition = {
  modelName: string;
  schema: Schema;
};

export const collections: Record<CollectionName, CollectionDefinition> = {
  tenant: { modelName: "Tenant", schema: tenantSchema },
  product: { modelName: "Product", schema: productSchema },
  customer: { modelName: "Customer", schema: customerSchema },
  order: { modelName: "Order", schema: orderSchema },
  coupon: { modelName: "Coupon", schema: couponSchema },
  admin_user: { modelName: "AdminUser", schema: adminUserSchema },
  webhook: { modelName: "Webhook", schema: webhookSchema },
  theme_settings: { modelName: "ThemeSettings", schema: themeSettingsSchema }
};

export const collectionNames = Object.keys(collections).filter(
  (name): name is CollectionName => name in collections
);

export type IndexDescription = {
  fields: string[];
  unique: boolean;
};

export function describeIndexes(collection: CollectionName): IndexDescription[] {
  return collections[collection].schema.indexes().map(([keys, options]) => ({
    fields: Object.keys(keys),
    unique: options.unique === true
  }));
}

export function describeFields(collection: CollectionName) {
  return Object.keys(collections[collection].schema.paths).filter((path) => path !== "_id");
}

import { z } from "zod";
import {
  adminUserSchema,
  couponSchema,
  productSchema,
  themeSettingsSchema,
  webhookSchema
} from "@storefront/shared-types";

const storedId = { _id: z.string() };

export const storedProductSchema = productSchema.extend(storedId);
export const storedCouponSchema = couponSchema.extend(storedId);
export const storedAdminUserSchema = adminUserSchema.extend(storedId);
export const storedWebhookSchema = webhookSchema.extend(storedId);
export const storedThemeSettingsSchema = themeSettingsSchema.extend(storedId);

export type StoredProduct = z.infer<typeof storedProductSchema>;
export type StoredCoupon = z.infer<typeof storedCouponSchema>;
export type StoredAdminUser = z.infer<typeof storedAdminUserSchema>;
export type StoredWebhook = z.infer<typeof storedWebhookSchema>;

import { z } from "zod";

export const objectIdSchema = z
  .string()
  .regex(/^[a-f\d]{24}$/i, "Invalid id format")
  .toLowerCase();

const optionalText = z.string().trim().min(1).nullable().default(null);

export const tenantSchema = z.object({
  name: z.string().trim().min(1),
  domain: optionalText,
  plan: z.string().trim().min(1).default("free"),
  contact_email: z.string().email().toLowerCase().nullable().default(null)
});

export const productSchema = z.object({
  tenant_id: objectIdSchema,
  title: z.string().trim().min(1),
  description: optionalText,
  price: z.number().min(0),
  image: optionalText,
  stock: z.number().int().min(0).default(0),
  category: optionalText,
  is_active: z.boolean().default(true)
});

export const customerSchema = z.object({
  tenant_id: objectIdSchema,
  name: z.string().trim().min(1),
  email: z.string().email().toLowerCase()
});

export const orderStatusSchema = z.enum(["pending", "paid", "shipped", "cancelled", "refunded"]);

export const orderItemSchema = z.object({
  product_id: objectIdSchema,
  quantity: z.number().int().positive(),
  price: z.number().min(0),
  title: z.string().nullable().default(null)
});

export const orderSchema = z.object({
  tenant_id: objectIdSchema,
  customer_id: objectIdSchema.nullable().default(null),
  customer_name: optionalText,
  customer_email: z.string().email().toLowerCase().nullable().default(null),
  items: z.array(orderItemSchema),
  subtotal: z.number().min(0),
  discount: z.number().min(0).default(0),
  coupon_code: z.string().nullable().default(null),
  total: z.number().min(0),
  status: orderStatusSchema.default("pending")
});

// Codes are matched exactly as entered, apart from surrounding whitespace.
export const couponCodeSchema = z.string().trim().min(1);

export const couponSchema = z.object({
  tenant_id: objectIdSchema,
  code: couponCodeSchema,
  percent_off: z.number().min(0).max(100).nullable().default(null),
  amount_off: z.number().min(0).nullable().default(null),
  active: z.boolean().default(true),
  max_redemptions: z.number().int().min(0).nullable().default(null),
  times_redeemed: z.number().int().min(0).default(0)
});

export const adminRoleSchema = z.enum(["owner", "staff"]);

export const adminUserSchema = z.object({
  tenant_id: objectIdSchema,
  email: z.string().email().toLowerCase(),
  password_hash: z.string().min(1),
  role: adminRoleSchema.default("owner")
});

export const webhookSchema = z.object({
  tenant_id: objectIdSchema,
  url: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), "Webhook url must use http or https"),
  events: z
    .array(z.string().trim().min(1))
    .default([])
    .transform((events) => Array.from(new Set(events))),
  active: z.boolean().default(true)
});

export const themeDefaults = {
  primary_color: "#111827",
  hero_heading: "Welcome to our store",
  hero_subtext: "Discover products picked just for you.",
  logo_url: null,
  featured_categories: []
} as const;

export const themeSettingsSchema = z.object({
  tenant_id: objectIdSchema,
  primary_color: z
    .string()
    .regex(/^#(?:[0-9a-f]{3}|[0-9a-f]{6})$/i, "Expected a hex colour")
    .default(themeDefaults.primary_color),
  hero_heading: z.string().trim().min(1).max(120).default(themeDefaults.hero_heading),
  hero_subtext: z.string().trim().max(240).default(themeDefaults.hero_subtext),
  logo_url: z.string().url().nullable().default(themeDefaults.logo_url),
  featured_categories: z.array(z.string().trim().min(1)).max(24).default([])
});

export const adminRegisterSchema = z.object({
  tenant_id: objectIdSchema,
  email: z.string().email().toLowerCase(),
  password: z.string().min(8),
  role: adminRoleSchema.default("owner")
});

export const adminLoginSchema = z.object({
  tenant_id: objectIdSchema,
  email: z.string().email().toLowerCase(),
  password: z.string().min(1)
});

export const adminClaimsSchema = z.object({
  tenant_id: objectIdSchema,
  email: z.string().email(),
  role: adminRoleSchema
});

// product_id and quantity are checked per item by the order workflow so the
// first offending item decides the error.
export const orderItemRequestSchema = z.object({
  product_id: z.string().min(1).optional(),
  quantity: z.number().int().default(1)
});

export const orderCreateSchema = z.object({
  tenant_id: objectIdSchema,
  items: z.array(orderItemRequestSchema),
  customer_id: objectIdSchema.optional(),
  customer_name: z.string().trim().min(1).optional(),
  customer_email: z.string().email().toLowerCase().optional(),
  coupon_code: couponCodeSchema.optional()
});

export const stockAdjustmentSchema = z.object({
  delta: z
    .number()
    .int()
    .refine((delta) => delta !== 0, "delta must be non-zero")
});

const limitSchema = (fallback: number) => z.coerce.number().int().positive().max(500).default(fallback);

const activeFlagSchema = z
  .enum(["true", "false"])
  .transform((value) => value === "true")
  .optional();

export const tenantListQuerySchema = z.object({
  limit: limitSchema(50)
});

export const tenantScopedQuerySchema = z.object({
  tenant_id: objectIdSchema
});

export const searchListQuerySchema = (fallbackLimit: number) =>
  z.object({
    tenant_id: objectIdSchema,
    q: z.string().trim().optional(),
    limit: limitSchema(fallbackLimit)
  });

export const activeListQuerySchema = (fallbackLimit: number) =>
  z.object({
    tenant_id: objectIdSchema,
    active: activeFlagSchema,
    limit: limitSchema(fallbackLimit)
  });

export const orderListQuerySchema = z.object({
  tenant_id: objectIdSchema,
  status: orderStatusSchema.optional(),
  limit: limitSchema(100)
});

export type Tenant = z.infer<typeof tenantSchema>;
export type Product = z.infer<typeof productSchema>;
export type Customer = z.infer<typeof customerSchema>;
export type OrderStatus = z.infer<typeof orderStatusSchema>;
export type OrderItem = z.infer<typeof orderItemSchema>;
export type Order = z.infer<typeof orderSchema>;
export type Coupon = z.infer<typeof couponSchema>;
export type AdminRole = z.infer<typeof adminRoleSchema>;
export type AdminUser = z.infer<typeof adminUserSchema>;
export type Webhook = z.infer<typeof webhookSchema>;
export type ThemeSettings = z.infer<typeof themeSettingsSchema>;
export type AdminRegisterRequest = z.infer<typeof adminRegisterSchema>;
export type AdminLoginRequest = z.infer<typeof adminLoginSchema>;
export type AdminClaims = z.infer<typeof adminClaimsSchema>;
export type OrderItemRequest = z.infer<typeof orderItemRequestSchema>;
export type OrderCreateRequest = z.infer<typeof orderCreateSchema>;
export type StockAdjustmentRequest = z.infer<typeof stockAdjustmentSchema>;

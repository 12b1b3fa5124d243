import { describe, expect, it } from "vitest";
import {
  activeListQuerySchema,
  couponSchema,
  orderCreateSchema,
  productSchema,
  searchListQuerySchema,
  stockAdjustmentSchema,
  tenantSchema,
  themeDefaults,
  themeSettingsSchema,
  webhookSchema
} from "../src/index.js";

const tenantId = "65f1c0ffee0000000000a001";

describe("entity schemas", () => {
  it("fills tenant defaults", () => {
    expect(tenantSchema.parse({ name: "Corner Shop" })).toEqual({
      name: "Corner Shop",
      domain: null,
      plan: "free",
      contact_email: null
    });
  });

  it("rejects negative prices and fractional stock", () => {
    expect(productSchema.safeParse({ tenant_id: tenantId, title: "Mug", price: -1 }).success).toBe(false);
    expect(productSchema.safeParse({ tenant_id: tenantId, title: "Mug", price: 4, stock: 1.5 }).success).toBe(false);
  });

  it("defaults product stock and visibility", () => {
    const product = productSchema.parse({ tenant_id: tenantId, title: "Mug", price: 4 });
    expect(product.stock).toBe(0);
    expect(product.is_active).toBe(true);
    expect(product.description).toBeNull();
  });

  it("rejects malformed tenant ids", () => {
    const result = productSchema.safeParse({ tenant_id: "not-an-id", title: "Mug", price: 4 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].message).toBe("Invalid id format");
    }
  });

  it("trims coupon codes without changing their case and bounds percent_off", () => {
    const coupon = couponSchema.parse({ tenant_id: tenantId, code: "  Spring10 ", percent_off: 10 });
    expect(coupon.code).toBe("Spring10");
    expect(coupon.times_redeemed).toBe(0);
    expect(coupon.amount_off).toBeNull();
    expect(couponSchema.safeParse({ tenant_id: tenantId, code: "X", percent_off: 120 }).success).toBe(false);
  });

  it("treats webhook events as a set", () => {
    const webhook = webhookSchema.parse({
      tenant_id: tenantId,
      url: "https://hooks.example.test/orders",
      events: ["order.created", "order.created", "product.updated"]
    });
    expect(webhook.events).toEqual(["order.created", "product.updated"]);
    expect(webhook.active).toBe(true);
  });

  it("rejects non-http webhook urls", () => {
    expect(webhookSchema.safeParse({ tenant_id: tenantId, url: "ftp://hooks.example.test" }).success).toBe(false);
  });

  it("fills theme settings from the documented defaults", () => {
    expect(themeSettingsSchema.parse({ tenant_id: tenantId })).toEqual({
      tenant_id: tenantId,
      primary_color: themeDefaults.primary_color,
      hero_heading: themeDefaults.hero_heading,
      hero_subtext: themeDefaults.hero_subtext,
      logo_url: null,
      featured_categories: []
    });
  });
});

describe("request schemas", () => {
  it("defaults item quantity to one and leaves product checks to the workflow", () => {
    const order = orderCreateSchema.parse({ tenant_id: tenantId, items: [{ product_id: "abc" }, { quantity: 0 }] });
    expect(order.items).toEqual([{ product_id: "abc", quantity: 1 }, { quantity: 0 }]);
  });

  it("keeps the order coupon code as entered", () => {
    const order = orderCreateSchema.parse({ tenant_id: tenantId, items: [], coupon_code: " save5 " });
    expect(order.coupon_code).toBe("save5");
  });

  it("rejects a zero stock delta", () => {
    expect(stockAdjustmentSchema.safeParse({ delta: 0 }).success).toBe(false);
    expect(stockAdjustmentSchema.parse({ delta: -3 })).toEqual({ delta: -3 });
  });

  it("coerces list query strings", () => {
    expect(searchListQuerySchema(100).parse({ tenant_id: tenantId, q: " shirt ", limit: "5" })).toEqual({
      tenant_id: tenantId,
      q: "shirt",
      limit: 5
    });
    expect(activeListQuerySchema(50).parse({ tenant_id: tenantId, active: "false" })).toEqual({
      tenant_id: tenantId,
      active: false,
      limit: 50
    });
  });
});

import type { Coupon } from "@storefront/shared-types";

export function roundMoney(value: number) {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function couponDiscount(subtotal: number, coupon: Pick<Coupon, "percent_off" | "amount_off">) {
  let discount = 0;
  if (coupon.percent_off !== null) {
    discount += (subtotal * coupon.percent_off) / 100;
  }
  if (coupon.amount_off !== null) {
    discount += coupon.amount_off;
  }
  return discount;
}

export function settleTotals(subtotal: number, discount: number) {
  return {
    subtotal: roundMoney(subtotal),
    discount: roundMoney(discount),
    total: roundMoney(Math.max(0, subtotal - discount))
  };
}

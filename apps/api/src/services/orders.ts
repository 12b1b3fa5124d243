import { orderSchema, type OrderCreateRequest, type OrderItem } from "@storefront/shared-types";
import { AppError } from "../lib/errors.js";
import { couponDiscount, settleTotals } from "../lib/pricing.js";
import { storedCouponSchema, storedProductSchema, type StoredCoupon } from "../lib/records.js";
import type { DocumentStore } from "../store/types.js";
import { parseId } from "../utils/ids.js";
import type { EventNotifier } from "./webhookDispatcher.js";
import { assertTenantExists } from "./tenant.js";

export type OrderDependencies = {
  store: DocumentStore;
  webhooks: EventNotifier;
};

export type PlacedOrder = {
  id: string;
  total: number;
  subtotal: number;
  discount: number;
};

type Compensation = {
  label: string;
  run: () => Promise<unknown>;
};

function insufficientStock(title: string | null) {
  return new AppError("InsufficientStock", `Insufficient stock for ${title ?? "product"}`);
}

async function findActiveCoupon(store: DocumentStore, tenantId: string, code: string): Promise<StoredCoupon | null> {
  const row = await store.findOne("coupon", { tenant_id: tenantId, code, active: true });
  return row ? storedCouponSchema.parse(row) : null;
}

async function resolveItems(store: DocumentStore, input: OrderCreateRequest) {
  if (input.items.length === 0) {
    throw new AppError("InvalidInput", "Order must contain at least one item");
  }

  const items: OrderItem[] = [];
  let subtotal = 0;

  for (const requested of input.items) {
    if (!requested.product_id || requested.quantity <= 0) {
      throw new AppError("InvalidInput", "Invalid item");
    }

    const productId = parseId(requested.product_id, "product id");
    const row = await store.findOne("product", { _id: productId, tenant_id: input.tenant_id });
    if (!row) {
      throw new AppError("NotFound", "Product not found");
    }

    const product = storedProductSchema.parse(row);
    if (product.stock < requested.quantity) {
      throw insufficientStock(product.title);
    }

    items.push({
      product_id: productId,
      quantity: requested.quantity,
      price: product.price,
      title: product.title
    });
    subtotal += product.price * requested.quantity;
  }

  return { items, subtotal };
}

async function compensate(steps: Compensation[]) {
  for (const step of [...steps].reverse()) {
    try {
      await step.run();
    } catch (error) {
      console.error("[orders] compensation failed", { step: step.label, error });
    }
  }
}

/**
 * Validates every item and the coupon before touching any document, then
 * reserves stock, redeems the coupon and records the order as one unit. A
 * failure part-way reverses the writes already applied.
 */
export async function placeOrder({ store, webhooks }: OrderDependencies, input: OrderCreateRequest): Promise<PlacedOrder> {
  await assertTenantExists(store, input.tenant_id);

  if (input.customer_id) {
    const customers = await store.count("customer", { _id: input.customer_id, tenant_id: input.tenant_id }, 1);
    if (customers === 0) {
      throw new AppError("NotFound", "Customer not found");
    }
  }

  const { items, subtotal } = await resolveItems(store, input);

  let coupon: StoredCoupon | null = null;
  let discount = 0;
  if (input.coupon_code) {
    coupon = await findActiveCoupon(store, input.tenant_id, input.coupon_code);
    if (!coupon) {
      throw new AppError("InvalidCoupon", "Invalid or inactive coupon");
    }
    discount = couponDiscount(subtotal, coupon);
  }

  const totals = settleTotals(subtotal, discount);
  const order = orderSchema.parse({
    tenant_id: input.tenant_id,
    customer_id: input.customer_id ?? null,
    customer_name: input.customer_name ?? null,
    customer_email: input.customer_email ?? null,
    items,
    subtotal: totals.subtotal,
    discount: totals.discount,
    coupon_code: coupon?.code ?? null,
    total: totals.total,
    status: "pending"
  });

  const orderId = await store.transaction(async (tx) => {
    const applied: Compensation[] = [];
    try {
      for (const item of items) {
        const reserved = await tx.updateOne(
          "product",
          { _id: item.product_id, tenant_id: input.tenant_id, stock: { $gte: item.quantity } },
          { $inc: { stock: -item.quantity } }
        );
        if (reserved.matched === 0) {
          throw insufficientStock(item.title);
        }
        applied.push({
          label: `restock ${item.product_id}`,
          run: () => tx.updateOne("product", { _id: item.product_id }, { $inc: { stock: item.quantity } })
        });
      }

      if (coupon) {
        const couponId = coupon._id;
        await tx.updateOne("coupon", { _id: couponId }, { $inc: { times_redeemed: 1 } });
        applied.push({
          label: `unredeem ${couponId}`,
          run: () => tx.updateOne("coupon", { _id: couponId }, { $inc: { times_redeemed: -1 } })
        });
      }

      return await tx.insert("order", order);
    } catch (error) {
      await compensate(applied);
      throw error;
    }
  });

  webhooks.notify(input.tenant_id, "order.created", {
    order_id: orderId,
    total: totals.total,
    coupon: coupon?.code ?? null
  });

  return { id: orderId, ...totals };
}

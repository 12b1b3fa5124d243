import axios from "axios";
import { storedWebhookSchema, type StoredWebhook } from "../lib/records.js";
import type { DocumentStore } from "../store/types.js";

const MAX_WEBHOOKS_PER_EVENT = 100;

export type WebhookEnvelope = {
  event: string;
  data: Record<string, unknown>;
};

export interface WebhookTransport {
  post(url: string, body: WebhookEnvelope, config: { timeout: number }): Promise<unknown>;
}

export interface EventNotifier {
  notify(tenantId: string, event: string, data: Record<string, unknown>): void;
}

export type DeliveryReport = {
  attempted: number;
  delivered: number;
  failed: number;
};

function describeFailure(reason: unknown) {
  if (axios.isAxiosError(reason)) {
    return reason.response ? `HTTP ${reason.response.status}` : (reason.code ?? reason.message);
  }
  return reason instanceof Error ? reason.message : String(reason);
}

export function createHttpTransport(): WebhookTransport {
  return axios.create({
    headers: { "Content-Type": "application/json", "User-Agent": "storefront-webhooks/1" }
  });
}

/**
 * Best-effort delivery of tenant events. Every failure is logged and dropped:
 * there is no retry, and callers never see delivery errors.
 */
export class WebhookDispatcher implements EventNotifier {
  constructor(
    private readonly store: DocumentStore,
    private readonly transport: WebhookTransport = createHttpTransport(),
    private readonly timeoutMs = 2000
  ) {}

  private async activeWebhooks(tenantId: string) {
    const rows = await this.store.find("webhook", { tenant_id: tenantId, active: true }, MAX_WEBHOOKS_PER_EVENT);
    const hooks: StoredWebhook[] = [];
    for (const row of rows) {
      const parsed = storedWebhookSchema.safeParse(row);
      if (parsed.success) {
        hooks.push(parsed.data);
      } else {
        console.warn("[webhooks] skipping malformed webhook", { id: row._id });
      }
    }
    return hooks;
  }

  async dispatch(tenantId: string, event: string, data: Record<string, unknown>): Promise<DeliveryReport> {
    const hooks = await this.activeWebhooks(tenantId);
    const envelope: WebhookEnvelope = { event, data };

    const results = await Promise.allSettled(
      hooks.map((hook) => this.transport.post(hook.url, envelope, { timeout: this.timeoutMs }))
    );

    let delivered = 0;
    results.forEach((result, index) => {
      if (result.status === "fulfilled") {
        delivered += 1;
        return;
      }
      console.warn("[webhooks] delivery failed", {
        tenantId,
        event,
        url: hooks[index].url,
        reason: describeFailure(result.reason)
      });
    });

    return { attempted: hooks.length, delivered, failed: hooks.length - delivered };
  }

  notify(tenantId: string, event: string, data: Record<string, unknown>) {
    setImmediate(() => {
      this.dispatch(tenantId, event, data).catch((error: unknown) => {
        console.error("[webhooks] dispatch failed", { tenantId, event, reason: describeFailure(error) });
      });
    });
  }
}

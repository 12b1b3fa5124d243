import { tenantSchema } from "@storefront/shared-types";
import type { EventNotifier, WebhookEnvelope, WebhookTransport } from "../src/services/webhookDispatcher.js";
import { MemoryDocumentStore } from "../src/store/memory.js";
import type { CollectionName, DocumentData, DocumentStore } from "../src/store/types.js";

export type RecordedPost = {
  url: string;
  body: WebhookEnvelope;
  timeout: number;
};

export class RecordingTransport implements WebhookTransport {
  readonly posts: RecordedPost[] = [];
  readonly failing = new Set<string>();

  async post(url: string, body: WebhookEnvelope, config: { timeout: number }) {
    this.posts.push({ url, body, timeout: config.timeout });
    if (this.failing.has(url)) {
      throw new Error(`connect ECONNREFUSED ${url}`);
    }
    return { status: 200 };
  }
}

export type RecordedEvent = {
  tenantId: string;
  event: string;
  data: Record<string, unknown>;
};

export class RecordingNotifier implements EventNotifier {
  readonly events: RecordedEvent[] = [];

  notify(tenantId: string, event: string, data: Record<string, unknown>) {
    this.events.push({ tenantId, event, data });
  }
}

export async function seedTenant(store: DocumentStore, name = "Corner Shop") {
  return store.insert("tenant", tenantSchema.parse({ name }));
}

/**
 * Memory store whose transactions run straight through with no rollback, the
 * way the Mongo store behaves when MONGODB_TRANSACTIONS is off.
 */
export class PassThroughStore extends MemoryDocumentStore {
  readonly failingInserts = new Set<CollectionName>();
  beforeWork?: (store: DocumentStore) => Promise<void>;

  async insert(collection: CollectionName, doc: DocumentData) {
    if (this.failingInserts.has(collection)) {
      throw new Error(`insert into ${collection} failed`);
    }
    return super.insert(collection, doc);
  }

  async transaction<T>(work: (store: DocumentStore) => Promise<T>): Promise<T> {
    if (this.beforeWork) {
      await this.beforeWork(this);
    }
    return work(this);
  }
}

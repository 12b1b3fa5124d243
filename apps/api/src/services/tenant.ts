import { AppError } from "../lib/errors.js";
import type { DocumentStore } from "../store/types.js";
import { parseId } from "../utils/ids.js";

export async function assertTenantExists(store: DocumentStore, tenantId: string) {
  const matches = await store.count("tenant", { _id: parseId(tenantId, "tenant id") }, 1);
  if (matches === 0) {
    throw new AppError("NotFound", "Tenant not found");
  }
}

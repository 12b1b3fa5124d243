import type { StoredDocument } from "../store/types.js";

export function toPublic({ _id, ...fields }: StoredDocument) {
  return { id: _id, ...fields };
}

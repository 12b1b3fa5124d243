import type { CollectionName } from "../models/index.js";

export type { CollectionName };

export type DocumentData = Record<string, unknown>;

export type StoredDocument = DocumentData & { _id: string };

export type FilterCondition = { $regex: string; $options?: string } | { $gte: number };

export type FilterValue = string | number | boolean | null | FilterCondition;

/** Equality on each key, or one of the supported operators. `_id` is always a hex string here. */
export type Filter = Record<string, FilterValue>;

export type Update = {
  $set?: DocumentData;
  $inc?: Record<string, number>;
};

export type UpdateOptions = {
  upsert?: boolean;
};

export type UpdateResult = {
  matched: number;
  modified: number;
  upserted: boolean;
};

export type StoreDiagnostics = {
  driver: "mongo" | "memory";
  connected: boolean;
  databaseName: string;
  collections: string[];
};

export interface DocumentStore {
  insert(collection: CollectionName, doc: DocumentData): Promise<string>;
  find(collection: CollectionName, filter: Filter, limit: number): Promise<StoredDocument[]>;
  findOne(collection: CollectionName, filter: Filter): Promise<StoredDocument | null>;
  updateOne(collection: CollectionName, filter: Filter, update: Update, options?: UpdateOptions): Promise<UpdateResult>;
  count(collection: CollectionName, filter: Filter, limit?: number): Promise<number>;
  /**
   * Runs `work` against a store bound to one unit of work. Implementations
   * that cannot isolate writes run `work` directly against themselves.
   */
  transaction<T>(work: (store: DocumentStore) => Promise<T>): Promise<T>;
  ensureIndexes(): Promise<void>;
  diagnostics(): Promise<StoreDiagnostics>;
  close(): Promise<void>;
}

export class DuplicateKeyError extends Error {
  constructor(
    readonly collection: CollectionName,
    readonly fields: string[]
  ) {
    super(`Duplicate key on ${collection} (${fields.join(", ")})`);
    this.name = "DuplicateKeyError";
  }
}

export function isFilterCondition(value: FilterValue): value is FilterCondition {
  return typeof value === "object" && value !== null;
}

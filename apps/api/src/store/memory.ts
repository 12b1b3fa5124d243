import { Types } from "mongoose";
import { collectionNames, collections } from "../models/index.js";
import {
  DuplicateKeyError,
  isFilterCondition,
  type CollectionName,
  type DocumentData,
  type DocumentStore,
  type Filter,
  type FilterValue,
  type StoreDiagnostics,
  type StoredDocument,
  type Update,
  type UpdateOptions,
  type UpdateResult
} from "./types.js";

type Collections = Map<CollectionName, StoredDocument[]>;

function matchesValue(actual: unknown, expected: FilterValue) {
  if (!isFilterCondition(expected)) {
    return actual === expected;
  }
  if ("$regex" in expected) {
    return typeof actual === "string" && new RegExp(expected.$regex, expected.$options).test(actual);
  }
  return typeof actual === "number" && actual >= expected.$gte;
}

function matches(doc: StoredDocument, filter: Filter) {
  return Object.entries(filter).every(([key, expected]) => matchesValue(doc[key], expected));
}

function equalityFields(filter: Filter): DocumentData {
  return Object.fromEntries(Object.entries(filter).filter(([, value]) => !isFilterCondition(value)));
}

function applyUpdate(doc: StoredDocument, update: Update): StoredDocument {
  const next: StoredDocument = { ...doc, ...structuredClone(update.$set ?? {}) };
  for (const [key, amount] of Object.entries(update.$inc ?? {})) {
    const current = next[key];
    next[key] = (typeof current === "number" ? current : 0) + amount;
  }
  return next;
}

function uniqueKeys(collection: CollectionName) {
  return collections[collection].schema
    .indexes()
    .filter(([, options]) => options.unique === true)
    .map(([keys]) => Object.keys(keys));
}

/**
 * In-process store with the same filter and update semantics the services
 * rely on from MongoDB. Used by the test suite and by STORE_DRIVER=memory.
 */
export class MemoryDocumentStore implements DocumentStore {
  private data: Collections = new Map();

  private rows(collection: CollectionName) {
    let rows = this.data.get(collection);
    if (!rows) {
      rows = [];
      this.data.set(collection, rows);
    }
    return rows;
  }

  private assertUnique(collection: CollectionName, candidate: StoredDocument) {
    const rows = this.rows(collection);
    for (const fields of uniqueKeys(collection)) {
      const clash = rows.some(
        (row) => row._id !== candidate._id && fields.every((field) => row[field] === candidate[field])
      );
      if (clash) {
        throw new DuplicateKeyError(collection, fields);
      }
    }
  }

  async insert(collection: CollectionName, doc: DocumentData) {
    const stored: StoredDocument = { ...structuredClone(doc), _id: new Types.ObjectId().toHexString() };
    this.assertUnique(collection, stored);
    this.rows(collection).push(stored);
    return stored._id;
  }

  async find(collection: CollectionName, filter: Filter, limit: number) {
    return this.rows(collection)
      .filter((row) => matches(row, filter))
      .slice(0, limit)
      .map((row) => structuredClone(row));
  }

  async findOne(collection: CollectionName, filter: Filter) {
    const row = this.rows(collection).find((candidate) => matches(candidate, filter));
    return row ? structuredClone(row) : null;
  }

  async updateOne(
    collection: CollectionName,
    filter: Filter,
    update: Update,
    options: UpdateOptions = {}
  ): Promise<UpdateResult> {
    const rows = this.rows(collection);
    const index = rows.findIndex((row) => matches(row, filter));

    if (index === -1) {
      if (!options.upsert) {
        return { matched: 0, modified: 0, upserted: false };
      }
      const seed: StoredDocument = { ...equalityFields(filter), _id: new Types.ObjectId().toHexString() };
      const created = applyUpdate(seed, update);
      this.assertUnique(collection, created);
      rows.push(created);
      return { matched: 0, modified: 0, upserted: true };
    }

    const next = applyUpdate(rows[index], update);
    this.assertUnique(collection, next);
    rows[index] = next;
    return { matched: 1, modified: 1, upserted: false };
  }

  async count(collection: CollectionName, filter: Filter, limit?: number) {
    const total = this.rows(collection).filter((row) => matches(row, filter)).length;
    return limit === undefined ? total : Math.min(total, limit);
  }

  async transaction<T>(work: (store: DocumentStore) => Promise<T>): Promise<T> {
    const snapshot: Collections = structuredClone(this.data);
    try {
      return await work(this);
    } catch (error) {
      this.data = snapshot;
      throw error;
    }
  }

  async ensureIndexes() {
    // Unique keys are checked on every write; nothing to build.
  }

  async diagnostics(): Promise<StoreDiagnostics> {
    return {
      driver: "memory",
      connected: true,
      databaseName: "memory",
      collections: collectionNames.filter((name) => this.rows(name).length > 0)
    };
  }

  async close() {
    this.data.clear();
  }
}

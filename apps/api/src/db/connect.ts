import mongoose from "mongoose";
import { env } from "../config/env.js";
import { MemoryDocumentStore } from "../store/memory.js";
import { MongoDocumentStore } from "../store/mongo.js";
import type { DocumentStore } from "../store/types.js";

/**
 * Opens the document store selected by STORE_DRIVER and builds its indexes.
 * The caller owns the returned store and must `close()` it on shutdown.
 */
export async function connectDatabase(): Promise<DocumentStore> {
  if (env.STORE_DRIVER === "memory") {
    return new MemoryDocumentStore();
  }

  const connection = await mongoose
    .createConnection(env.MONGODB_URI, {
      dbName: env.MONGODB_DB_NAME,
      serverSelectionTimeoutMS: 15000,
      family: 4
    })
    .asPromise();

  const store = new MongoDocumentStore(connection, { transactions: env.MONGODB_TRANSACTIONS });
  await store.ensureIndexes();
  return store;
}

import mongoose, { type Connection, type Model, type mongo } from "mongoose";
import { collectionNames, collections, type CollectionName } from "../models/index.js";
import { toObjectId } from "../utils/ids.js";
import {
  DuplicateKeyError,
  type DocumentData,
  type DocumentStore,
  type Filter,
  type StoreDiagnostics,
  type StoredDocument,
  type Update,
  type UpdateOptions,
  type UpdateResult
} from "./types.js";

type MongoDocument = mongo.Document;
type ClientSession = mongo.ClientSession;

export type SessionControl = Pick<
  ClientSession,
  "startTransaction" | "commitTransaction" | "abortTransaction" | "endSession"
>;

const DUPLICATE_KEY_CODE = 11000;

export function toMongoFilter(filter: Filter): MongoDocument {
  const { _id, ...rest } = filter;
  if (typeof _id === "string") {
    return { ...rest, _id: toObjectId(_id) };
  }
  return rest;
}

function toMongoUpdate(update: Update): MongoDocument {
  const mongoUpdate: MongoDocument = {};
  if (update.$set) {
    mongoUpdate.$set = update.$set;
  }
  if (update.$inc) {
    mongoUpdate.$inc = update.$inc;
  }
  return mongoUpdate;
}

export function fromMongo(doc: MongoDocument): StoredDocument {
  return { ...doc, _id: String(doc._id) };
}

/** Maps a unique-index violation to `DuplicateKeyError`; anything else is returned untouched. */
export function toDuplicateKeyError(collection: CollectionName, error: unknown) {
  if (!(error instanceof mongoose.mongo.MongoServerError) || error.code !== DUPLICATE_KEY_CODE) {
    return error;
  }
  const keyPattern: unknown = error.keyPattern;
  const fields = typeof keyPattern === "object" && keyPattern !== null ? Object.keys(keyPattern) : [];
  return new DuplicateKeyError(collection, fields);
}

/**
 * Runs `work` inside a started transaction. Abort is only attempted when the
 * failure happened before commit, so a commit error reaches the caller as is.
 */
export async function runInSession<T>(session: SessionControl, work: () => Promise<T>) {
  let committing = false;
  try {
    session.startTransaction();
    const result = await work();
    committing = true;
    await session.commitTransaction();
    return result;
  } catch (error) {
    if (!committing) {
      await session.abortTransaction();
    }
    throw error;
  } finally {
    await session.endSession();
  }
}

export type MongoStoreOptions = {
  transactions: boolean;
};

export class MongoDocumentStore implements DocumentStore {
  constructor(
    private readonly connection: Connection,
    private readonly options: MongoStoreOptions,
    private readonly session?: ClientSession
  ) {
    for (const definition of Object.values(collections)) {
      if (!connection.models[definition.modelName]) {
        connection.model(definition.modelName, definition.schema);
      }
    }
  }

  private model(name: CollectionName): Model<MongoDocument> {
    return this.connection.model<MongoDocument>(collections[name].modelName);
  }

  private async guardDuplicates<T>(collection: CollectionName, write: () => Promise<T>) {
    try {
      return await write();
    } catch (error) {
      throw toDuplicateKeyError(collection, error);
    }
  }

  async insert(collection: CollectionName, doc: DocumentData) {
    const [created] = await this.guardDuplicates(collection, () =>
      this.model(collection).create([{ ...doc }], { session: this.session })
    );
    return String(created._id);
  }

  async find(collection: CollectionName, filter: Filter, limit: number) {
    const rows = await this.model(collection)
      .find(toMongoFilter(filter), null, { limit, session: this.session })
      .lean<MongoDocument[]>();
    return rows.map(fromMongo);
  }

  async findOne(collection: CollectionName, filter: Filter) {
    const row = await this.model(collection)
      .findOne(toMongoFilter(filter), null, { session: this.session })
      .lean<MongoDocument>();
    return row ? fromMongo(row) : null;
  }

  async updateOne(
    collection: CollectionName,
    filter: Filter,
    update: Update,
    options: UpdateOptions = {}
  ): Promise<UpdateResult> {
    const result = await this.guardDuplicates(collection, () =>
      this.model(collection).updateOne(toMongoFilter(filter), toMongoUpdate(update), {
        upsert: options.upsert ?? false,
        runValidators: true,
        session: this.session
      })
    );
    return {
      matched: result.matchedCount,
      modified: result.modifiedCount,
      upserted: result.upsertedCount > 0
    };
  }

  async count(collection: CollectionName, filter: Filter, limit?: number) {
    return this.model(collection).countDocuments(toMongoFilter(filter), { limit, session: this.session });
  }

  async transaction<T>(work: (store: DocumentStore) => Promise<T>): Promise<T> {
    if (this.session || !this.options.transactions) {
      return work(this);
    }

    const session = await this.connection.startSession();
    return runInSession(session, () => work(new MongoDocumentStore(this.connection, this.options, session)));
  }

  async ensureIndexes() {
    await Promise.all(collectionNames.map((name) => this.model(name).createIndexes()));
  }

  async diagnostics(): Promise<StoreDiagnostics> {
    const db = this.connection.db;
    const infos = db ? await db.listCollections({}, { nameOnly: true }).toArray() : [];
    return {
      driver: "mongo",
      connected: this.connection.readyState === mongoose.ConnectionStates.connected,
      databaseName: this.connection.name,
      collections: infos.map((info) => info.name)
    };
  }

  async close() {
    await this.connection.close();
  }
}

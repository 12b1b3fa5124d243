import { describe, expect, it, vi } from "vitest";
import mongoose, { Types } from "mongoose";
import { AppError } from "../src/lib/errors.js";
import { fromMongo, runInSession, toDuplicateKeyError, toMongoFilter } from "../src/store/mongo.js";
import { DuplicateKeyError } from "../src/store/types.js";

const productId = "65f1c0ffee0000000000c003";

function fakeSession(commit: () => Promise<void> = async () => {}) {
  return {
    startTransaction: vi.fn(),
    commitTransaction: vi.fn(commit),
    abortTransaction: vi.fn(async () => {}),
    endSession: vi.fn(async () => undefined)
  };
}

describe("mongo document store helpers", () => {
  it("converts string ids to ObjectIds in filters", () => {
    const filter = toMongoFilter({ _id: productId, tenant_id: "t1", stock: { $gte: 2 } });

    expect(filter._id).toBeInstanceOf(Types.ObjectId);
    expect(String(filter._id)).toBe(productId);
    expect(filter.tenant_id).toBe("t1");
    expect(filter.stock).toEqual({ $gte: 2 });
  });

  it("passes filters without an id through", () => {
    expect(toMongoFilter({ tenant_id: "t1", active: true })).toEqual({ tenant_id: "t1", active: true });
  });

  it("rejects malformed ids before querying", () => {
    expect(() => toMongoFilter({ _id: "not-an-id" })).toThrow(AppError);
  });

  it("exposes stored ids as hex strings", () => {
    const row = fromMongo({ _id: new Types.ObjectId(productId), title: "Mug", stock: 2 });

    expect(row).toEqual({ _id: productId, title: "Mug", stock: 2 });
  });

  it("maps duplicate key errors to DuplicateKeyError", () => {
    const serverError = new mongoose.mongo.MongoServerError({
      message: "E11000 duplicate key error collection: storefront.coupon",
      code: 11000,
      keyPattern: { tenant_id: 1, code: 1 }
    });

    const mapped = toDuplicateKeyError("coupon", serverError);

    expect(mapped).toBeInstanceOf(DuplicateKeyError);
    expect(mapped).toMatchObject({ collection: "coupon", fields: ["tenant_id", "code"] });
  });

  it("leaves other errors untouched", () => {
    const otherServerError = new mongoose.mongo.MongoServerError({ message: "not primary", code: 10107 });
    const plain = new Error("socket closed");

    expect(toDuplicateKeyError("coupon", otherServerError)).toBe(otherServerError);
    expect(toDuplicateKeyError("coupon", plain)).toBe(plain);
  });
});

describe("session transactions", () => {
  it("commits successful work", async () => {
    const session = fakeSession();

    await expect(runInSession(session, async () => "order-1")).resolves.toBe("order-1");

    expect(session.startTransaction).toHaveBeenCalledTimes(1);
    expect(session.commitTransaction).toHaveBeenCalledTimes(1);
    expect(session.abortTransaction).not.toHaveBeenCalled();
    expect(session.endSession).toHaveBeenCalledTimes(1);
  });

  it("aborts when the work fails", async () => {
    const session = fakeSession();

    await expect(
      runInSession(session, async () => {
        throw new Error("insert failed");
      })
    ).rejects.toThrow("insert failed");

    expect(session.abortTransaction).toHaveBeenCalledTimes(1);
    expect(session.commitTransaction).not.toHaveBeenCalled();
    expect(session.endSession).toHaveBeenCalledTimes(1);
  });

  it("surfaces a commit failure without attempting an abort", async () => {
    const session = fakeSession(async () => {
      throw new Error("commit failed");
    });

    await expect(runInSession(session, async () => "order-1")).rejects.toThrow("commit failed");

    expect(session.abortTransaction).not.toHaveBeenCalled();
    expect(session.endSession).toHaveBeenCalledTimes(1);
  });
});

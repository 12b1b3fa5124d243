import mongoose, { Types } from "mongoose";
import { AppError } from "../lib/errors.js";

export function parseId(id: string, label = "id") {
  if (!mongoose.isObjectIdOrHexString(id)) {
    throw new AppError("InvalidInput", `Invalid ${label} format`);
  }
  return id.toLowerCase();
}

export function toObjectId(id: string) {
  return new Types.ObjectId(parseId(id));
}

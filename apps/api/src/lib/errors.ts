import type { ZodIssue, ZodTypeAny, output } from "zod";

export type ErrorCode =
  | "InvalidInput"
  | "NotFound"
  | "DuplicateCoupon"
  | "DuplicateUser"
  | "InsufficientStock"
  | "InvalidCoupon"
  | "Unauthorized";

const statusByCode: Record<ErrorCode, number> = {
  InvalidInput: 400,
  NotFound: 404,
  DuplicateCoupon: 400,
  DuplicateUser: 400,
  InsufficientStock: 400,
  InvalidCoupon: 400,
  Unauthorized: 401
};

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly issues?: ZodIssue[]
  ) {
    super(message);
    this.name = "AppError";
  }

  get status() {
    return statusByCode[this.code];
  }
}

export function parseInput<T extends ZodTypeAny>(schema: T, value: unknown, message: string): output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new AppError("InvalidInput", message, parsed.error.issues);
  }
  return parsed.data;
}

import type { FilterCondition } from "../store/types.js";

export function containsInsensitive(term: string): FilterCondition {
  return { $regex: term.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"), $options: "i" };
}

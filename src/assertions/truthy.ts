import type { Value } from "../types/value.js";

/**
 * Decide whether a value counts as true. Besides null and false, empty
 * lists, empty maps and the empty string are falsy.
 */
export function isTruthy(value: Value): boolean {
  const seed = value.kind !== "null" && !(value.kind === "boolean" && !value.value);
  const notEmptyCollection =
    !(value.kind === "list" && value.items.length === 0) &&
    !(value.kind === "map" && value.entries.length === 0);
  const notEmptyString = !(value.kind === "string" && value.value === "");
  return seed && notEmptyCollection && notEmptyString;
}

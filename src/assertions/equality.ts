import type { ListValue, MapValue, Value } from "../types/value.js";
import type { Verdict } from "../types/report.js";

const EPSILON = 1e-11;

function isEmptyCollection(value: Value): boolean {
  return (
    (value.kind === "list" && value.items.length === 0) ||
    (value.kind === "map" && value.entries.length === 0)
  );
}

function listsEqual(a: ListValue, b: ListValue): boolean {
  if (a.items.length !== b.items.length) return false;
  if (a.items.length > 1 && a.separator !== b.separator) return false;
  return a.items.every((item, i) => isEqual(item, b.items[i]));
}

function entriesCovered(a: MapValue, b: MapValue): boolean {
  return a.entries.every(([key, value]) =>
    b.entries.some(([otherKey, otherValue]) => isEqual(key, otherKey) && isEqual(value, otherValue))
  );
}

function mapsEqual(a: MapValue, b: MapValue): boolean {
  if (a.entries.length !== b.entries.length) return false;
  return entriesCovered(a, b) && entriesCovered(b, a);
}

/**
 * Structural equality between two values
 * - numbers need matching units
 * - string quoting is ignored
 * - an empty list equals an empty map
 */
export function isEqual(a: Value, b: Value): boolean {
  if (isEmptyCollection(a) && isEmptyCollection(b)) {
    return true;
  }

  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "boolean":
      return b.kind === "boolean" && a.value === b.value;
    case "number":
      return (
        b.kind === "number" &&
        a.unit === b.unit &&
        Math.abs(a.value - b.value) < EPSILON
      );
    case "string":
      return b.kind === "string" && a.value === b.value;
    case "list":
      return b.kind === "list" && listsEqual(a, b);
    case "map":
      return b.kind === "map" && mapsEqual(a, b);
  }
}

/**
 * Classify actual vs expected. With `invert`, inequality passes.
 */
export function getResult(actual: Value, expected: Value, invert = false): Verdict {
  const equal = isEqual(actual, expected);
  return equal !== invert ? "pass" : "fail";
}

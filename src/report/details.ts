import { typeName, type Value } from "../types/value.js";
import type { ReportSession } from "./session.js";

/**
 * Renders the notice written after each evaluated assertion
 */
export interface DetailRenderer {
  passDetails(session: ReportSession): void;
  failDetails(
    session: ReportSession,
    actual: Value,
    expected: Value,
    showDetail: boolean
  ): void;
}

function formatNumber(value: number): string {
  const rounded = Number(value.toFixed(10));
  return Object.is(rounded, -0) ? "0" : String(rounded);
}

/**
 * Render a value the way it would be written in a stylesheet
 */
export function inspect(value: Value, nested = false): string {
  switch (value.kind) {
    case "null":
      return "null";
    case "boolean":
      return String(value.value);
    case "number":
      return `${formatNumber(value.value)}${value.unit}`;
    case "string":
      return value.quoted ? JSON.stringify(value.value) : value.value;
    case "list": {
      if (value.items.length === 0) return "()";
      const separator = value.separator === "comma" ? ", " : " ";
      if (value.items.length === 1) {
        const item = inspect(value.items[0], true);
        return value.separator === "comma" ? `(${item},)` : item;
      }
      const joined = value.items.map((item) => inspect(item, true)).join(separator);
      return nested ? `(${joined})` : joined;
    }
    case "map": {
      if (value.entries.length === 0) return "()";
      const pairs = value.entries.map(
        ([key, item]) => `${inspect(key, true)}: ${inspect(item, true)}`
      );
      return `(${pairs.join(", ")})`;
    }
  }
}

/**
 * Explain why two values of different shape cannot be equal
 */
export function describeMismatch(actual: Value, expected: Value): string | undefined {
  if (actual.kind !== expected.kind) {
    return `type mismatch (${typeName(actual)} vs ${typeName(expected)})`;
  }
  if (actual.kind === "number" && expected.kind === "number" && actual.unit !== expected.unit) {
    return `unit mismatch (${actual.unit || "unitless"} vs ${expected.unit || "unitless"})`;
  }
  if (
    actual.kind === "list" &&
    expected.kind === "list" &&
    actual.items.length > 1 &&
    expected.items.length > 1 &&
    actual.separator !== expected.separator
  ) {
    return `separator mismatch (${actual.separator} vs ${expected.separator})`;
  }
  return undefined;
}

export const defaultRenderer: DetailRenderer = {
  passDetails(session) {
    const label = session.currentLabel("assert") ?? "";
    session.message(`${session.config.symbols.pass} ${label}`, "debug");
  },

  failDetails(session, actual, expected, showDetail) {
    const label = session.currentLabel("assert") ?? "";
    const lines = [`${session.config.symbols.fail} FAILED: ${label}`];

    if (showDetail) {
      lines.push(`  - Output: [${typeName(actual)}] ${inspect(actual)}`);
      lines.push(`  - Expected: [${typeName(expected)}] ${inspect(expected)}`);
    }
    const mismatch = describeMismatch(actual, expected);
    if (mismatch) {
      lines.push(`  - Details: ${mismatch}`);
    }

    const moduleName = session.currentLabel("module");
    if (moduleName !== undefined) lines.push(`  - Module: ${moduleName}`);
    const testName = session.currentLabel("test");
    if (testName !== undefined) lines.push(`  - Test: ${testName}`);

    session.message(lines, "comment");
    if (session.config.output.terminal) {
      session.message(lines, "warn");
    }
  },
};

import { EngineError } from "../report/errors.js";
import type { ReportSession } from "../report/session.js";
import type { BlockType, Verdict } from "../types/report.js";
import { bool, type Value } from "../types/value.js";
import { evaluate } from "./evaluate.js";
import { wrapBlock, wrapString } from "./format.js";
import { setup, strike } from "./lifecycle.js";
import { isTruthy } from "./truthy.js";

export interface EqualityOptions {
  description?: string;
  /** Print values on failure; defaults to `output.details` from config */
  inspect?: boolean;
}

// Blocks that may follow an `output` block inside one assertion
const AFTER_OUTPUT: ReadonlySet<BlockType> = new Set<BlockType>([
  "output",
  "expect",
  "contains",
  "contains-string",
]);

export function assertTrue(session: ReportSession, value: Value, description?: string): Verdict {
  setup(session, "assert-true", description);
  return evaluate(session, bool(isTruthy(value)), bool(true));
}

export function assertFalse(session: ReportSession, value: Value, description?: string): Verdict {
  setup(session, "assert-false", description);
  return evaluate(session, bool(isTruthy(value)), bool(false));
}

export function assertEqual(
  session: ReportSession,
  actual: Value,
  expected: Value,
  options: EqualityOptions = {}
): Verdict {
  setup(session, "assert-equal", options.description);
  return evaluate(session, actual, expected, {
    outputDetail: options.inspect ?? session.config.output.details,
  });
}

export function assertUnequal(
  session: ReportSession,
  actual: Value,
  expected: Value,
  options: EqualityOptions = {}
): Verdict {
  setup(session, "assert-unequal", options.description);
  return evaluate(session, actual, expected, {
    invert: true,
    outputDetail: options.inspect ?? session.config.output.details,
  });
}

/**
 * Output comparison. `body` writes an `output` block followed by `expect`,
 * `contains` or `containsString`; the comparison itself happens when the
 * generated CSS is parsed.
 */
export function assertOutput(
  session: ReportSession,
  body: () => void,
  description?: string
): void {
  setup(session, "assert", description);
  wrapBlock(session, "assert", body, { selector: false, description });
  strike(session, "output-to-css", true);
}

export function output(session: ReportSession, body: () => void): void {
  if (session.currentFrame()?.kind !== "assert") {
    throw new EngineError("output must be used inside an output assertion");
  }
  wrapBlock(session, "output", body);
}

function requireOutput(session: ReportSession, block: string): void {
  const mode = session.outputMode;
  if (mode === null || !AFTER_OUTPUT.has(mode)) {
    throw new EngineError(`${block} must follow an output block`);
  }
}

export function expect(session: ReportSession, body: () => void): void {
  requireOutput(session, "expect");
  wrapBlock(session, "expect", body);
}

export function contains(session: ReportSession, body: () => void): void {
  requireOutput(session, "contains");
  wrapBlock(session, "contains", body);
}

export function containsString(session: ReportSession, needle: string): void {
  requireOutput(session, "containsString");
  wrapString(session, "contains-string", needle);
}

import type { ReportSession } from "../report/session.js";
import type { Verdict } from "../types/report.js";
import type { Value } from "../types/value.js";
import { requireAssertFrame, strike } from "./lifecycle.js";

export interface EvaluateOptions {
  /** Expect inequality instead of equality */
  invert?: boolean;
  /** Print actual and expected values when the assertion fails */
  outputDetail?: boolean;
  resetOutput?: boolean;
}

/**
 * Compare actual against expected, write pass or fail details and close
 * the current assertion. A failing assertion is returned, not thrown.
 */
export function evaluate(
  session: ReportSession,
  actual: Value,
  expected: Value,
  options: EvaluateOptions = {}
): Verdict {
  const { invert = false, outputDetail = true, resetOutput = false } = options;
  requireAssertFrame(session, "evaluate");
  const result = session.getResult(actual, expected, invert);

  if (result === "pass") {
    session.renderer.passDetails(session);
  } else {
    session.renderer.failDetails(session, actual, expected, outputDetail);
  }

  strike(session, result, resetOutput);
  return result;
}

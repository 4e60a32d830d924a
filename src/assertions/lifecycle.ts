import { EngineError } from "../report/errors.js";
import type { ReportSession } from "../report/session.js";
import type { Result } from "../types/report.js";

/**
 * Throw unless the innermost frame is an assertion opened by setup
 */
export function requireAssertFrame(session: ReportSession, caller: string): void {
  const frame = session.currentFrame();
  if (!frame) {
    throw new EngineError(`${caller} called with an empty context stack`);
  }
  if (frame.kind !== "assert") {
    throw new EngineError(
      `${caller} called without a matching setup (innermost context is ${frame.kind} "${frame.label}")`
    );
  }
}

/**
 * Open an assertion scope labelled "[name] description". Without a
 * description the enclosing test's label is used.
 */
export function setup(session: ReportSession, name: string, description?: string): void {
  const effective = description ?? session.currentLabel("test") ?? "";
  const label = effective ? `[${name}] ${effective}` : `[${name}]`;
  session.context("assert", label);
}

/**
 * Close the innermost assertion scope: record its result, count it and pop
 * the frame. Every setup must be matched by exactly one strike.
 */
export function strike(session: ReportSession, result: Result, resetOutput = false): void {
  requireAssertFrame(session, "strike");

  session.updateTest(result);
  session.updateStatsCount("assertions");
  session.contextPop();
  if (resetOutput) {
    session.outputContext(null);
  }
}

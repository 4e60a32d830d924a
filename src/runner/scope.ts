import { EngineError } from "../report/errors.js";
import type { ReportSession } from "../report/session.js";
import type { ContextKind } from "../types/report.js";

function closeFrame(session: ReportSession, kind: ContextKind, name: string) {
  const frame = session.contextPop();
  if (frame.kind !== kind || frame.label !== name) {
    throw new EngineError(
      `Unbalanced context: expected to close ${kind} "${name}", found ${frame.kind} "${frame.label}"`
    );
  }
  return frame;
}

/**
 * Group tests into a module
 */
export function describe(session: ReportSession, name: string, body: () => void): void {
  session.context("module", name);
  session.message([`# Module: ${name}`, "-".repeat(name.length + 10)], "comment");
  body();
  closeFrame(session, "module", name);
  session.updateStatsCount("modules");
}

/**
 * Run the assertions of one test. A test without assertions counts as passed.
 */
export function it(session: ReportSession, name: string, body: () => void): void {
  session.context("test", name);
  session.message(`Test: ${name}`, "comment");
  body();
  const frame = closeFrame(session, "test", name);
  const result = frame.result ?? "pass";
  const { symbols } = session.config;

  session.updateStatsCount("tests");
  switch (result) {
    case "pass":
      session.updateStatsCount("passed");
      session.message(`${symbols.pass} ${name}`, "debug");
      break;
    case "fail":
      session.updateStatsCount("failed");
      session.message(`${symbols.fail} ${name}`, "debug");
      break;
    case "output-to-css":
      session.updateStatsCount("output-to-css");
      session.message(`${symbols.output} ${name}`, "debug");
      break;
  }
}

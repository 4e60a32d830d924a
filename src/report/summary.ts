import type { ReportSession } from "./session.js";

export interface ReportSummary {
  modules: number;
  tests: number;
  passed: number;
  failed: number;
  outputToCss: number;
  assertions: number;
}

const RULE = "-".repeat(20);

function plural(count: number, noun: string): string {
  return `${count} ${count === 1 ? noun : `${noun}s`}`;
}

export function summarize(session: ReportSession): ReportSummary {
  return {
    modules: session.count("modules"),
    tests: session.count("tests"),
    passed: session.count("passed"),
    failed: session.count("failed"),
    outputToCss: session.count("output-to-css"),
    assertions: session.count("assertions"),
  };
}

/**
 * Write the summary block as comments and return the counts
 */
export function report(session: ReportSession): ReportSummary {
  const summary = summarize(session);
  session.message(
    [
      "# SUMMARY ----------",
      `${plural(summary.tests, "Test")}:`,
      ` - ${summary.passed} Passed`,
      ` - ${summary.failed} Failed`,
      ` - ${summary.outputToCss} Output to CSS`,
      "Stats:",
      ` - ${plural(summary.modules, "Module")}`,
      ` - ${plural(summary.assertions, "Assertion")}`,
      RULE,
    ],
    "comment"
  );
  return summary;
}

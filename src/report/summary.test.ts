import { describe, it, expect } from "vitest";
import { report, summarize } from "./summary.js";
import { ReportSession } from "./session.js";

function sessionWith(counts: Record<string, number>) {
  const session = new ReportSession();
  for (const [name, count] of Object.entries(counts)) {
    for (let i = 0; i < count; i++) session.updateStatsCount(name);
  }
  return session;
}

describe("summarize", () => {
  it("reads the counters", () => {
    const session = sessionWith({ tests: 3, passed: 1, failed: 1, "output-to-css": 1, assertions: 5 });
    expect(summarize(session)).toEqual({
      modules: 0,
      tests: 3,
      passed: 1,
      failed: 1,
      outputToCss: 1,
      assertions: 5,
    });
  });
});

describe("report", () => {
  it("writes the summary block as comments", () => {
    const session = sessionWith({ modules: 1, tests: 1, passed: 1, assertions: 1 });
    const summary = report(session);

    expect(summary.tests).toBe(1);
    expect(session.lines("comment").map((l) => l.text)).toEqual([
      "# SUMMARY ----------",
      "1 Test:",
      " - 1 Passed",
      " - 0 Failed",
      " - 0 Output to CSS",
      "Stats:",
      " - 1 Module",
      " - 1 Assertion",
      "--------------------",
    ]);
  });

  it("pluralises counts", () => {
    const session = sessionWith({ tests: 2, passed: 2, assertions: 4 });
    report(session);
    const texts = session.lines().map((l) => l.text);
    expect(texts[1]).toBe("2 Tests:");
    expect(texts[6]).toBe(" - 0 Modules");
    expect(texts[7]).toBe(" - 4 Assertions");
  });
});

import { describe as group, it as test, expect, vi } from "vitest";
import { describe, it } from "./scope.js";
import { assertEqual, assertOutput, containsString, output } from "../assertions/index.js";
import { ReportSession } from "../report/session.js";
import { EngineError } from "../report/errors.js";
import { num } from "../types/value.js";

function runModule(session: ReportSession) {
  describe(session, "Math", () => {
    it(session, "adds", () => {
      assertEqual(session, num(2), num(2));
    });
    it(session, "fails", () => {
      assertEqual(session, num(1), num(2), { inspect: false });
    });
    it(session, "empty", () => {});
    it(session, "css", () => {
      assertOutput(session, () => {
        output(session, () => session.emit("color: red;"));
        containsString(session, "red");
      });
    });
  });
}

group("describe / it", () => {
  test("counts modules, tests and results", () => {
    const session = new ReportSession();
    runModule(session);

    expect(session.stats()).toEqual({
      assertions: 3,
      tests: 4,
      passed: 2,
      failed: 1,
      "output-to-css": 1,
      modules: 1,
    });
    expect(session.depth).toBe(0);
  });

  test("writes module and test headers", () => {
    const session = new ReportSession();
    runModule(session);

    const texts = session.lines("comment").map((l) => l.text);
    expect(texts.slice(0, 3)).toEqual(["# Module: Math", "-".repeat(14), "Test: adds"]);
    expect(texts).toContain("Test: css");
  });

  test("reports each test result as debug", () => {
    const onDebug = vi.fn();
    const session = new ReportSession({ onDebug });
    runModule(session);

    expect(onDebug.mock.calls.map(([line]) => line)).toEqual([
      "✔ [assert-equal] adds",
      "✔ adds",
      "✖ fails",
      "✔ empty",
      "▶ css",
    ]);
  });

  test("throws an EngineError when a test leaves a frame open", () => {
    const session = new ReportSession();
    expect(() =>
      it(session, "leaky", () => {
        session.context("assert", "dangling");
      })
    ).toThrow(EngineError);
  });
});

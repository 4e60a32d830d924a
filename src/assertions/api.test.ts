import { describe, it, expect } from "vitest";
import {
  assertEqual,
  assertFalse,
  assertOutput,
  assertTrue,
  assertUnequal,
  contains,
  containsString,
  expect as expectBlock,
  output,
} from "./api.js";
import { ReportSession } from "../report/session.js";
import { EngineError } from "../report/errors.js";
import { ProjectConfigSchema } from "../types/config.js";
import { list, nil, num, str } from "../types/value.js";

function createSession(details = true) {
  const config = ProjectConfigSchema.parse({ output: { terminal: false, details } });
  const session = new ReportSession({ config });
  session.context("test", "math");
  return session;
}

describe("assertEqual", () => {
  it("passes and records equal values", () => {
    const session = createSession();
    expect(assertEqual(session, num(5), num(5), { description: "same" })).toBe("pass");
    expect(session.records).toEqual([
      { label: "[assert-equal] same", module: undefined, test: "math", result: "pass" },
    ]);
    expect(session.render()).toBe("");
  });

  it("writes failure details for unequal values", () => {
    const session = createSession();
    expect(assertEqual(session, num(5), num(6))).toBe("fail");
    expect(session.render()).toBe(
      [
        "/* ✖ FAILED: [assert-equal] math */",
        "/*   - Output: [number] 5 */",
        "/*   - Expected: [number] 6 */",
        "/*   - Test: math */",
      ].join("\n")
    );
  });

  it("hides values when inspect is off", () => {
    const session = createSession();
    assertEqual(session, num(5), num(6), { inspect: false });
    expect(session.lines().map((l) => l.text)).toEqual([
      "✖ FAILED: [assert-equal] math",
      "  - Test: math",
    ]);
  });

  it("takes the detail default from config", () => {
    const session = createSession(false);
    assertEqual(session, str("a"), str("b"));
    expect(session.lines()).toHaveLength(2);
  });
});

describe("assertUnequal", () => {
  it("passes on different values", () => {
    const session = createSession();
    expect(assertUnequal(session, num(5), num(6))).toBe("pass");
    expect(assertUnequal(session, num(5), num(5))).toBe("fail");
    expect(session.records.map((r) => r.label)).toEqual([
      "[assert-unequal] math",
      "[assert-unequal] math",
    ]);
  });
});

describe("assertTrue / assertFalse", () => {
  it("uses truthiness", () => {
    const session = createSession();
    expect(assertTrue(session, list([num(0)]))).toBe("pass");
    expect(assertTrue(session, str(""))).toBe("fail");
    expect(assertFalse(session, nil())).toBe("pass");
    expect(assertFalse(session, str("0"))).toBe("fail");
    expect(session.count("assertions")).toBe(4);
    expect(session.depth).toBe(1);
  });
});

describe("assertOutput", () => {
  it("writes output and expected blocks inside the assertion", () => {
    const session = createSession();
    assertOutput(
      session,
      () => {
        output(session, () => session.emit("padding: 16px;"));
        expectBlock(session, () => session.emit("padding: 16px;"));
      },
      "pads"
    );

    expect(session.render()).toBe(
      [
        "/* ASSERT: pads */",
        "/* OUTPUT */",
        ".test-output { padding: 16px; }",
        "/* END_OUTPUT */",
        "/* EXPECTED */",
        ".test-output { padding: 16px; }",
        "/* END_EXPECTED */",
        "/* END_ASSERT */",
      ].join("\n")
    );
    expect(session.outputMode).toBeNull();
    expect(session.depth).toBe(1);
    expect(session.records[0]).toEqual({
      label: "[assert] pads",
      module: undefined,
      test: "math",
      result: "output-to-css",
    });
  });

  it("labels the block with the test name without a description", () => {
    const session = createSession();
    assertOutput(session, () => {
      output(session, () => session.emit("margin: 0;"));
      contains(session, () => session.emit("margin: 0;"));
      containsString(session, "margin");
    });

    expect(session.lines("comment").map((l) => l.text)).toEqual([
      "ASSERT: math",
      "OUTPUT",
      "END_OUTPUT",
      "CONTAINED",
      "END_CONTAINED",
      "CONTAINS_STRING",
      "margin",
      "END_CONTAINS_STRING",
      "END_ASSERT",
    ]);
  });

  it("rejects expect before output", () => {
    const session = createSession();
    expect(() =>
      assertOutput(session, () => expectBlock(session, () => {}))
    ).toThrow(EngineError);
  });

  it("rejects output outside an assertion", () => {
    const session = createSession();
    expect(() => output(session, () => {})).toThrow(/inside an output assertion/);
  });

  it("rejects containsString outside an output block", () => {
    const session = createSession();
    expect(() => containsString(session, "x")).toThrow(EngineError);
  });
});

export type ContextKind = "module" | "test" | "assert";

/** Outcome of comparing two values */
export type Verdict = "pass" | "fail";

/**
 * Outcome recorded for an assertion. Output assertions are only compared
 * once the generated CSS is parsed, so they record "output-to-css".
 */
export type Result = Verdict | "output-to-css";

export interface ContextFrame {
  kind: ContextKind;
  label: string;
  result?: Result;
}

export type BlockType =
  | "assert"
  | "output"
  | "expect"
  | "contains"
  | "contains-string";

export type MessageCategory = "comment" | "debug" | "warn";

export interface OutputLine {
  category: "comment" | "css";
  text: string;
}

export interface AssertionRecord {
  label: string;
  module?: string;
  test?: string;
  result: Result;
}

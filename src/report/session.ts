import { getResult } from "../assertions/equality.js";
import { DEFAULT_CONFIG, type ProjectConfig } from "../types/config.js";
import type {
  AssertionRecord,
  BlockType,
  ContextFrame,
  ContextKind,
  MessageCategory,
  OutputLine,
  Result,
  Verdict,
} from "../types/report.js";
import type { Value } from "../types/value.js";
import { defaultRenderer, type DetailRenderer } from "./details.js";
import { EngineError } from "./errors.js";

export interface ReportSessionOptions {
  config?: ProjectConfig;
  renderer?: DetailRenderer;
  onLog?: (message: string) => void;
  onDebug?: (message: string) => void;
  onWarn?: (message: string) => void;
}

// Precedence when several assertion results land on one test
const RESULT_RANK: Record<Result, number> = {
  pass: 0,
  "output-to-css": 1,
  fail: 2,
};

function renderLine(line: OutputLine): string {
  if (line.category === "css") {
    return line.text;
  }
  return `/* ${line.text.replace(/\*\//g, "* /")} */`;
}

/**
 * State shared by every assertion in one run: the context stack, the active
 * output mode, statistics counters and the generated CSS.
 */
export class ReportSession {
  readonly config: ProjectConfig;
  readonly renderer: DetailRenderer;
  readonly records: AssertionRecord[] = [];

  private readonly stack: ContextFrame[] = [];
  private readonly counters = new Map<string, number>();
  private readonly output: OutputLine[] = [];
  private readonly captures: OutputLine[][] = [];
  private mode: BlockType | null = null;
  private readonly log: (message: string) => void;
  private readonly debug: (message: string) => void;
  private readonly warn: (message: string) => void;

  constructor(options: ReportSessionOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.renderer = options.renderer ?? defaultRenderer;
    this.log = options.onLog ?? (() => {});
    this.debug = options.onDebug ?? (() => {});
    this.warn = options.onWarn ?? this.log;
  }

  get outputMode(): BlockType | null {
    return this.mode;
  }

  get depth(): number {
    return this.stack.length;
  }

  outputContext(type: BlockType | null): void {
    this.mode = type;
  }

  /**
   * Push a context frame. Without a label the innermost test label is used.
   */
  context(kind: ContextKind, label?: string): void {
    this.stack.push({ kind, label: label ?? this.currentLabel("test") ?? "" });
  }

  contextPop(): ContextFrame {
    const frame = this.stack.pop();
    if (!frame) {
      throw new EngineError("Cannot pop context: the context stack is empty");
    }
    return frame;
  }

  currentFrame(): ContextFrame | undefined {
    return this.stack[this.stack.length - 1];
  }

  currentLabel(kind: ContextKind): string | undefined {
    return this.findFrame(kind)?.label;
  }

  /**
   * Record an assertion result against the innermost test
   */
  updateTest(result: Result): void {
    const frame = this.findFrame("test") ?? this.currentFrame();
    if (!frame) {
      throw new EngineError(`Cannot record "${result}": no open context`);
    }
    if (frame.result === undefined || RESULT_RANK[result] > RESULT_RANK[frame.result]) {
      frame.result = result;
    }
    this.records.push({
      label: this.currentLabel("assert") ?? frame.label,
      module: this.currentLabel("module"),
      test: this.currentLabel("test"),
      result,
    });
  }

  updateStatsCount(name: string): void {
    this.counters.set(name, this.count(name) + 1);
  }

  count(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  stats(): Record<string, number> {
    return Object.fromEntries(this.counters);
  }

  getResult(actual: Value, expected: Value, invert = false): Verdict {
    return getResult(actual, expected, invert);
  }

  /**
   * Write a message. Comments become CSS comment lines (one per item);
   * debug and warn messages go to the callbacks.
   */
  message(text: string | string[], category: MessageCategory): void {
    const lines = Array.isArray(text) ? text : [text];
    switch (category) {
      case "comment":
        for (const line of lines) {
          this.write({ category: "comment", text: line });
        }
        break;
      case "debug":
        lines.forEach((line) => this.debug(line));
        break;
      case "warn":
        lines.forEach((line) => this.warn(line));
        break;
    }
  }

  /**
   * Write a raw CSS line
   */
  emit(css: string): void {
    this.write({ category: "css", text: css });
  }

  /**
   * Run `fn` and return the rendered lines it wrote, instead of writing them
   */
  capture(fn: () => void): string[] {
    const buffer: OutputLine[] = [];
    this.captures.push(buffer);
    try {
      fn();
    } finally {
      this.captures.pop();
    }
    return buffer.map(renderLine);
  }

  lines(category?: OutputLine["category"]): OutputLine[] {
    return category ? this.output.filter((l) => l.category === category) : [...this.output];
  }

  render(): string {
    return this.output.map(renderLine).join("\n");
  }

  private write(line: OutputLine): void {
    const target = this.captures[this.captures.length - 1] ?? this.output;
    target.push(line);
  }

  private findFrame(kind: ContextKind): ContextFrame | undefined {
    for (let i = this.stack.length - 1; i >= 0; i--) {
      if (this.stack[i].kind === kind) return this.stack[i];
    }
    return undefined;
  }
}

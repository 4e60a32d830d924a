import {
  assertEqual,
  assertFalse,
  assertOutput,
  assertTrue,
  assertUnequal,
  contains,
  containsString,
  expect,
  output,
} from "../assertions/index.js";
import {
  interpolate,
  interpolateAll,
  interpolateValue,
  type Variables,
} from "../config/interpolate.js";
import { executeHooks } from "../hooks/index.js";
import type { ReportSession } from "../report/session.js";
import type { Assertion, AssertionRecord, OutputAssert, TestFile } from "../types/index.js";
import { isEqualAssert, isOutputAssert, isTruthyAssert } from "../types/test.js";
import { fromPlain } from "../types/value.js";
import { describe, it } from "./scope.js";

export interface TestRunnerOptions {
  session: ReportSession;
  test: TestFile;
  testFilePath: string;
  verbose?: boolean;
  onLog?: (message: string) => void;
  onDebug?: (message: string) => void;
}

export interface TestResult {
  testName: string;
  passed: boolean;
  failures: string[];
  assertions: number;
  error?: string;
}

/**
 * Run one test file as a module in the shared session
 */
export async function runTest(options: TestRunnerOptions): Promise<TestResult> {
  const { session, test, testFilePath, verbose, onLog, onDebug } = options;
  const log = onLog ?? (() => {});
  const debug = onDebug ?? (() => {});

  debug(`[Run] ${testFilePath}`);

  let variables: Variables = {};
  if (test.hooks && test.hooks.length > 0) {
    if (verbose) log("  Executing hooks...");
    try {
      variables = await executeHooks(test.hooks, { onDebug: debug });
    } catch (err) {
      const message = `Hook failed: ${(err as Error).message}`;
      return {
        testName: test.name,
        passed: false,
        failures: [message],
        assertions: 0,
        error: message,
      };
    }
    if (verbose) {
      const varKeys = Object.keys(variables);
      if (varKeys.length > 0) {
        log(`  Variables: ${varKeys.join(", ")}`);
      }
    }
  }

  const firstRecord = session.records.length;

  describe(session, test.name, () => {
    for (const testCase of test.tests) {
      it(session, testCase.name, () => {
        for (const assertion of testCase.assert) {
          runAssertion(session, assertion, variables);
        }
      });
    }
  });

  const records = session.records.slice(firstRecord);
  const failures = records
    .filter((record) => record.result === "fail")
    .map(formatFailure);

  if (verbose) {
    for (const failure of failures) log(`    ${failure}`);
  }

  return {
    testName: test.name,
    passed: failures.length === 0,
    failures,
    assertions: records.length,
  };
}

/**
 * Dispatch one parsed assertion to the assertion API
 */
export function runAssertion(
  session: ReportSession,
  assertion: Assertion,
  vars: Variables
): void {
  if (isEqualAssert(assertion)) {
    const actual = fromPlain(interpolateValue(assertion.actual, vars));
    const expected = fromPlain(interpolateValue(assertion.expected, vars));
    const options = {
      description: describeWith(assertion.description, vars),
      inspect: assertion.inspect,
    };
    if (assertion.type === "equal") {
      assertEqual(session, actual, expected, options);
    } else {
      assertUnequal(session, actual, expected, options);
    }
  } else if (isTruthyAssert(assertion)) {
    const value = fromPlain(interpolateValue(assertion.value, vars));
    if (assertion.type === "truthy") {
      assertTrue(session, value, describeWith(assertion.description, vars));
    } else {
      assertFalse(session, value, describeWith(assertion.description, vars));
    }
  } else if (isOutputAssert(assertion)) {
    runOutputAssertion(session, assertion, vars);
  }
}

function runOutputAssertion(session: ReportSession, assertion: OutputAssert, vars: Variables): void {
  const emitAll = (declarations: string | string[]) => () => {
    for (const line of interpolateAll(declarations, vars)) session.emit(line);
  };

  assertOutput(
    session,
    () => {
      output(session, emitAll(assertion.output));
      if (assertion.expect !== undefined) {
        expect(session, emitAll(assertion.expect));
      }
      if (assertion.contains !== undefined) {
        contains(session, emitAll(assertion.contains));
      }
      if (assertion.contains_string !== undefined) {
        for (const needle of interpolateAll(assertion.contains_string, vars)) {
          containsString(session, needle);
        }
      }
    },
    describeWith(assertion.description, vars)
  );
}

function describeWith(description: string | undefined, vars: Variables): string | undefined {
  return description === undefined ? undefined : interpolate(description, vars);
}

function formatFailure(record: AssertionRecord): string {
  const prefix = record.test !== undefined ? `[${record.test}] ` : "";
  return `${prefix}${record.label}`;
}

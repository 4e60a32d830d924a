export { describe, it } from "./scope.js";
export { runTest, runAssertion, type TestRunnerOptions, type TestResult } from "./test.js";

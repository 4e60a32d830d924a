import { writeFileSync } from 'node:fs';
import { Command } from 'commander';
import pc from 'picocolors';
import { loadConfig, loadTestFile, type LoadConfigResult } from '../../config/index.js';
import {
  isEngineError,
  report,
  ReportSession,
  type ReportSessionOptions,
} from '../../report/index.js';
import { runTest, type TestResult } from '../../runner/index.js';
import type { TestFile } from '../../types/index.js';

export interface RunOptions {
  config?: string;
  verbose?: boolean;
  debug?: boolean;
  dryRun?: boolean;
  json?: boolean;
  out?: string;
  print?: boolean;
}

type SessionCallbacks = Pick<ReportSessionOptions, 'onLog' | 'onDebug' | 'onWarn'>;

/**
 * Console callbacks for the report session. Failure details arrive as
 * warnings; `output.terminal` in the config decides whether they are sent.
 */
export function sessionCallbacks(
  options: RunOptions,
  log: (message: string) => void
): SessionCallbacks {
  if (options.json) {
    const silent = () => {};
    return { onLog: silent, onDebug: undefined, onWarn: silent };
  }
  return {
    onLog: (msg) => log(msg),
    onDebug: options.debug ? (msg) => log(pc.dim(msg)) : undefined,
    onWarn: (msg) => log(pc.yellow(msg)),
  };
}

// Exit code for engine invariant violations, kept apart from test failures
const ENGINE_ERROR_EXIT = 2;

export const runCommand = new Command('run')
  .description('Run test files and generate the CSS report')
  .argument('<files...>', 'Test files (YAML)')
  .option('-c, --config <path>', 'Path to config file')
  .option('-v, --verbose', 'Verbose output')
  .option('--debug', 'Debug output (pass notices, hook output)')
  .option('-d, --dry-run', 'Validate tests without executing')
  .option('--json', 'Output results as JSON')
  .option('-o, --out <file>', 'Write the CSS report to a file')
  .option('--print', 'Print the CSS report to stdout')
  .action(async (files: string[], options: RunOptions) => {
    const verbose = options.verbose ?? false;
    const debugMode = options.debug ?? false;
    const jsonOutput = options.json ?? false;

    // Helper for conditional console output (suppressed in JSON mode)
    const log = jsonOutput ? () => {} : console.log;
    const logError = jsonOutput ? () => {} : console.error;

    const fail = (message: string, code = 1): never => {
      if (jsonOutput) {
        console.log(JSON.stringify({ error: message }, null, 2));
      } else {
        logError(pc.red('Error:'), message);
      }
      process.exit(code);
    };

    let configResult: LoadConfigResult;
    try {
      configResult = loadConfig({ configPath: options.config });
    } catch (err) {
      return fail((err as Error).message);
    }

    if (verbose) {
      log(pc.dim(`Config: ${configResult.configPath ?? '(defaults)'}`));
    }

    // Load and validate each test file
    let hasErrors = false;
    const tests: Array<{ test: TestFile; filePath: string }> = [];

    for (const filePath of files) {
      try {
        const { test } = loadTestFile(filePath);
        tests.push({ test, filePath });
        if (verbose) {
          log(pc.green('  ✓'), pc.dim(filePath), pc.dim(`(${test.tests.length} tests)`));
        }
      } catch (err) {
        hasErrors = true;
        logError(pc.red('  ✗'), filePath);
        logError(pc.red('   '), (err as Error).message);
      }
    }

    if (hasErrors) {
      logError(pc.red('\nSome test files failed validation.'));
      process.exit(1);
    }

    if (options.dryRun) {
      if (jsonOutput) {
        console.log(JSON.stringify({
          validated: tests.map((t) => ({ name: t.test.name, file: t.filePath })),
        }, null, 2));
      } else {
        log(pc.green(`✓ Validated ${tests.length} test file(s)`));
        for (const { test, filePath } of tests) {
          log(`  - ${test.name} (${filePath})`);
        }
      }
      process.exit(0);
    }

    const session = new ReportSession({
      config: configResult.config,
      ...sessionCallbacks(options, log),
    });

    const results: Array<TestResult & { filePath: string }> = [];

    for (const { test, filePath } of tests) {
      log(pc.cyan(`Running: ${test.name}`));

      try {
        const result = await runTest({
          session,
          test,
          testFilePath: filePath,
          verbose: verbose && !jsonOutput,
          onLog: (msg) => log(pc.dim(msg)),
          onDebug: debugMode && !jsonOutput ? (msg) => log(pc.dim(msg)) : undefined,
        });
        results.push({ ...result, filePath });

        if (result.passed) {
          log(pc.green('  ✓ PASS'), pc.dim(`(${result.assertions} assertions)`));
        } else {
          log(pc.red('  ✗ FAIL'));
          for (const failure of result.failures) {
            log(pc.red(`    - ${failure}`));
          }
        }
      } catch (err) {
        if (isEngineError(err)) {
          return fail(`Engine error in ${filePath}: ${err.message}`, ENGINE_ERROR_EXIT);
        }
        throw err;
      }
    }

    const summary = report(session);
    const css = session.render();

    if (options.out) {
      writeFileSync(options.out, `${css}\n`);
      log(pc.dim(`CSS report written to ${options.out}`));
    }
    if (options.print && !jsonOutput) {
      console.log(css);
    }

    const failedFiles = results.filter((r) => !r.passed).length;

    if (jsonOutput) {
      console.log(JSON.stringify({
        files: results.map((r) => ({
          name: r.testName,
          file: r.filePath,
          passed: r.passed,
          assertions: r.assertions,
          error: r.error,
          failures: r.failures.length > 0 ? r.failures : undefined,
        })),
        summary,
      }, null, 2));
    } else {
      log(pc.bold('─'.repeat(40)));
      log(
        pc.bold('Results:'),
        pc.green(`${summary.passed} passed`),
        summary.failed > 0 ? pc.red(`${summary.failed} failed`) : pc.dim('0 failed'),
        pc.dim(`${summary.outputToCss} output to CSS`)
      );
    }

    process.exit(failedFiles > 0 ? 1 : 0);
  });

import { execa } from 'execa';
import type { Hook } from '../types/index.js';
import { interpolate, type Variables } from '../config/interpolate.js';

const DEFAULT_TIMEOUT_MS = 30000;

export interface ExecuteHookOptions {
  currentVars?: Variables;
  onDebug?: (message: string) => void;
}

function preview(text: string): string {
  return text.length > 200 ? `${text.slice(0, 200)}...` : text;
}

/**
 * Parse hook stdout into variables. Empty output yields no variables;
 * anything else must be a JSON object.
 */
export function parseHookOutput(command: string, stdout: string): Variables {
  if (!stdout) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch {
    throw new Error(`Hook output is not valid JSON: ${command}\nStdout: ${stdout}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Hook output must be a JSON object: ${command}\nStdout: ${stdout}`);
  }

  const variables: Variables = {};
  for (const [key, value] of Object.entries(parsed)) {
    variables[key] = String(value);
  }
  return variables;
}

/**
 * Run a hook command and return the variables it prints
 */
export async function executeHook(hook: Hook, options: ExecuteHookOptions = {}): Promise<Variables> {
  const { currentVars = {}, onDebug } = options;
  const debug = onDebug ?? (() => {});
  const [cmd, ...args] = hook.cmd;
  const command = hook.cmd.join(' ');

  debug(`[Hook] Running: ${command}`);

  let env: NodeJS.ProcessEnv | undefined;
  if (hook.env) {
    env = { ...process.env };
    for (const [key, value] of Object.entries(hook.env)) {
      env[key] = interpolate(value, currentVars);
      debug(`[Hook] Env: ${key}=${env[key]}`);
    }
  }

  const result = await execa(cmd, args, {
    timeout: hook.timeout_ms ?? DEFAULT_TIMEOUT_MS,
    reject: true,
    env,
  });
  debug(`[Hook] Exit code: ${result.exitCode}`);

  const stderr = typeof result.stderr === 'string' ? result.stderr.trim() : '';
  if (stderr) {
    debug(`[Hook] Stderr: ${preview(stderr)}`);
  }

  const stdout = typeof result.stdout === 'string' ? result.stdout.trim() : '';
  debug(stdout ? `[Hook] Stdout: ${preview(stdout)}` : '[Hook] No output');

  const variables = parseHookOutput(command, stdout);
  debug(`[Hook] Variables: ${Object.keys(variables).join(', ') || '(none)'}`);
  return variables;
}

/**
 * Run hooks in order; later hooks see the variables of earlier ones
 */
export async function executeHooks(hooks: Hook[], options: ExecuteHookOptions = {}): Promise<Variables> {
  const variables: Variables = { ...options.currentVars };

  for (const hook of hooks) {
    Object.assign(variables, await executeHook(hook, { currentVars: variables, onDebug: options.onDebug }));
  }

  return variables;
}

import { readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import yaml from 'js-yaml';
import { ProjectConfigSchema, DEFAULT_CONFIG, type ProjectConfig } from '../types/index.js';

export const CONFIG_FILENAME = 'cssproof.config.yaml';

/**
 * Find config file by walking up from cwd
 */
function findConfigFile(startDir: string): string | null {
  let dir = startDir;
  while (true) {
    const configPath = resolve(dir, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      return configPath;
    }
    const parentDir = dirname(dir);
    if (parentDir === dir) {
      return null;
    }
    dir = parentDir;
  }
}

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
}

export interface LoadConfigResult {
  config: ProjectConfig;
  /** null when no config file exists and defaults are used */
  configPath: string | null;
}

/**
 * Parse and validate config file contents
 */
export function parseConfig(content: string, source: string): ProjectConfig {
  // An empty file loads as undefined
  const raw = yaml.load(content) ?? {};

  const result = ProjectConfigSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Invalid config file ${source}:\n${errors}`);
  }
  return result.data;
}

/**
 * Load project config, falling back to defaults when none is found
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadConfigResult {
  const cwd = options.cwd ?? process.cwd();

  if (options.configPath) {
    if (!existsSync(options.configPath)) {
      throw new Error(`Config file not found: ${options.configPath}`);
    }
  }

  const configPath = options.configPath ?? findConfigFile(cwd);
  if (!configPath) {
    return { config: DEFAULT_CONFIG, configPath: null };
  }

  const content = readFileSync(configPath, 'utf-8');
  return {
    config: parseConfig(content, configPath),
    configPath,
  };
}

import { readFileSync, existsSync } from 'node:fs';
import yaml from 'js-yaml';
import { TestFileSchema, type TestFile } from '../types/index.js';

export interface LoadTestResult {
  test: TestFile;
  filePath: string;
}

/**
 * Parse and validate test file contents
 */
export function parseTestFile(content: string, source: string): TestFile {
  const raw = yaml.load(content);

  const result = TestFileSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Invalid test file ${source}:\n${errors}`);
  }
  return result.data;
}

/**
 * Load and validate a single test file
 */
export function loadTestFile(filePath: string): LoadTestResult {
  if (!existsSync(filePath)) {
    throw new Error(`Test file not found: ${filePath}`);
  }

  const content = readFileSync(filePath, 'utf-8');
  return {
    test: parseTestFile(content, filePath),
    filePath,
  };
}

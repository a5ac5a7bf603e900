import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { glob } from 'glob';
import yaml from 'js-yaml';
import { TestCaseFormatError } from '../errors.js';
import { isRecord } from '../utils/guards.js';
import type { TestCase } from './types.js';

export const DEFAULT_CASES_PATH = fileURLToPath(new URL('../../cases/default.yaml', import.meta.url));

/**
 * Loads test cases from a YAML or JSON file. The document is either a list
 * of cases or a mapping with a `cases` list.
 */
export async function loadTestCases(path: string): Promise<TestCase[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (e) {
    throw new TestCaseFormatError(`cannot read file (${e instanceof Error ? e.message : String(e)})`, path);
  }

  let doc: unknown;
  try {
    doc = yaml.load(content);
  } catch (e) {
    throw new TestCaseFormatError(`invalid YAML/JSON: ${e instanceof Error ? e.message : String(e)}`, path);
  }

  return parseTestCases(doc, path);
}

/** Loads every file matching the given paths or globs, in sorted order per pattern. */
export async function loadTestCaseFiles(patterns: readonly string[]): Promise<TestCase[]> {
  const cases: TestCase[] = [];
  for (const pattern of patterns) {
    const files = (await glob(pattern, { nodir: true })).sort();
    if (files.length === 0) {
      throw new TestCaseFormatError(`no test case files match ${pattern}`);
    }
    for (const file of files) {
      cases.push(...(await loadTestCases(file)));
    }
  }
  return cases;
}

export function loadDefaultTestCases(): Promise<TestCase[]> {
  return loadTestCases(DEFAULT_CASES_PATH);
}

export function parseTestCases(doc: unknown, source?: string): TestCase[] {
  const entries = isRecord(doc) ? doc.cases : doc;
  if (!Array.isArray(entries)) {
    throw new TestCaseFormatError('expected a list of test cases or a mapping with a "cases" list', source);
  }

  const seen = new Set<string>();
  return entries.map((entry: unknown, index: number) => {
    const testCase = parseTestCase(entry, index, source);
    if (seen.has(testCase.id)) {
      throw new TestCaseFormatError(`case ${index}: duplicate id "${testCase.id}"`, source);
    }
    seen.add(testCase.id);
    return testCase;
  });
}

function parseTestCase(entry: unknown, index: number, source?: string): TestCase {
  const where = `case ${index}`;
  if (!isRecord(entry)) {
    throw new TestCaseFormatError(`${where}: must be a mapping`, source);
  }

  const id = requireString(entry, 'id', where, source);
  const at = `case ${index} (${id})`;
  const query = requireString(entry, 'query', at, source);
  const name = optionalString(entry, ['name'], at, source) ?? id;
  const expectedBehavior =
    optionalString(entry, ['expected_behavior', 'expectedBehavior'], at, source) ?? '';
  const expectedError = optionalString(entry, ['expected_error', 'expectedError'], at, source);

  const tools = pick(entry, ['expected_tools', 'expectedTools']) ?? [];
  if (!Array.isArray(tools) || !tools.every((tool): tool is string => typeof tool === 'string')) {
    throw new TestCaseFormatError(`${at}: expected_tools must be a list of tool names`, source);
  }

  const metadata = entry.metadata ?? {};
  if (!isRecord(metadata)) {
    throw new TestCaseFormatError(`${at}: metadata must be a mapping`, source);
  }

  const testCase: TestCase = { id, name, query, expectedBehavior, expectedTools: [...tools], metadata };
  if (expectedError !== undefined) {
    testCase.expectedError = expectedError;
  }
  return testCase;
}

function pick(entry: Record<string, unknown>, keys: string[]): unknown {
  for (const key of keys) {
    if (entry[key] !== undefined && entry[key] !== null) {
      return entry[key];
    }
  }
  return undefined;
}

function requireString(entry: Record<string, unknown>, key: string, where: string, source?: string): string {
  const value = entry[key];
  // YAML reads unquoted ids such as 12345 as numbers.
  if (typeof value === 'number') {
    return String(value);
  }
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new TestCaseFormatError(`${where}: "${key}" must be a non-empty string`, source);
  }
  return value;
}

function optionalString(
  entry: Record<string, unknown>,
  keys: string[],
  where: string,
  source?: string
): string | undefined {
  const value = pick(entry, keys);
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new TestCaseFormatError(`${where}: "${keys[0]}" must be a string`, source);
  }
  return value;
}

import type { ErrorKind } from '../classifier/types.js';

export interface TestCase {
  id: string;
  name: string;
  query: string;
  /** Free text for humans; never graded. */
  expectedBehavior: string;
  /** Lower bound: every listed tool must be used, extras are fine. */
  expectedTools: string[];
  /** An error kind name or a substring of the error message. */
  expectedError?: string;
  metadata: Record<string, unknown>;
}

export type TestCaseStatus = 'pending' | 'running' | 'passed' | 'failed';

export const FAILURE_CATEGORIES = [
  'uncaught_error',
  'unexpected_success',
  'wrong_error',
  'unexpected_failure',
  'missing_tools',
  'storage_error',
] as const;

export type FailureCategory = (typeof FAILURE_CATEGORIES)[number];

export interface TestResult {
  testCaseId: string;
  runId: string | null;
  passed: boolean;
  failureReasons: string[];
  failureCategory: FailureCategory | null;
  actualToolsUsed: string[];
  actualErrorKind: ErrorKind | null;
  actualOutput: string | null;
  durationMs: number;
  finishedAt: string;
}

export interface HarnessSummary {
  total: number;
  passed: number;
  failed: number;
  passRate: number;
  failuresByCategory: Record<FailureCategory, number>;
  averageDurationMs: number;
}

export type HarnessEvent =
  | { type: 'case:start'; testCase: TestCase }
  | { type: 'case:finish'; testCase: TestCase; result: TestResult };

export interface HarnessOptions {
  onEvent?: (event: HarnessEvent) => void;
}

export function emptyCategoryCounts(): Record<FailureCategory, number> {
  return {
    uncaught_error: 0,
    unexpected_success: 0,
    wrong_error: 0,
    unexpected_failure: 0,
    missing_tools: 0,
    storage_error: 0,
  };
}

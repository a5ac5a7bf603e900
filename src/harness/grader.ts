import type { ErrorKind } from '../classifier/types.js';
import type { Run } from '../observability/types.js';
import type { FailureCategory, TestCase } from './types.js';

export interface Grade {
  passed: boolean;
  failureReasons: string[];
  failureCategory: FailureCategory | null;
}

/**
 * Grades a finalized run against a test case. Expected tools are a lower
 * bound: extra tools never fail a case.
 */
export function gradeRun(testCase: TestCase, run: Run, toolsUsed: readonly string[]): Grade {
  if (run.status === 'running') {
    return fail('unexpected_failure', 'run was never finalized');
  }

  if (testCase.expectedError !== undefined) {
    const expected = testCase.expectedError;
    if (run.status === 'success') {
      return fail('unexpected_success', `expected error "${expected}", got success`);
    }
    if (!matchesExpectedError(expected, run.errorKind, run.errorMessage)) {
      return fail('wrong_error', `expected error "${expected}", got error ${describeError(run)}`);
    }
    return pass();
  }

  if (run.status === 'failed') {
    return fail('unexpected_failure', `expected success, got error ${describeError(run)}`);
  }

  const missing = missingTools(testCase.expectedTools, toolsUsed);
  if (missing.length > 0) {
    return fail('missing_tools', `missing expected tools: ${missing.join(', ')}`);
  }
  return pass();
}

/**
 * Kind equality first ("division_by_zero" or "division by zero"), then a
 * case-insensitive substring of the error message.
 */
export function matchesExpectedError(
  expected: string,
  kind: ErrorKind | null,
  message: string | null
): boolean {
  const wanted = expected.trim().toLowerCase();
  if (wanted.length === 0) {
    return true;
  }
  if (kind !== null && (wanted === kind || wanted === kind.replace(/_/g, ' '))) {
    return true;
  }
  return message !== null && message.toLowerCase().includes(wanted);
}

export function missingTools(expected: readonly string[], used: readonly string[]): string[] {
  const seen = new Set(used);
  return [...new Set(expected)].filter(tool => !seen.has(tool));
}

function describeError(run: Run): string {
  const kind = run.errorKind ?? 'unknown';
  return run.errorMessage ? `${kind}: ${run.errorMessage}` : kind;
}

function pass(): Grade {
  return { passed: true, failureReasons: [], failureCategory: null };
}

function fail(category: FailureCategory, reason: string): Grade {
  return { passed: false, failureReasons: [reason], failureCategory: category };
}

import { errorMessage } from '../classifier/classifier.js';
import { DuplicateTestCaseError, StorageError } from '../errors.js';
import { executeTraced, toolsUsed } from '../agents/execute.js';
import type { AgentCapability } from '../agents/types.js';
import type { RunHandle, Tracer } from '../observability/tracer.js';
import { gradeRun } from './grader.js';
import {
  emptyCategoryCounts,
  type HarnessEvent,
  type HarnessOptions,
  type HarnessSummary,
  type TestCase,
  type TestCaseStatus,
  type TestResult,
} from './types.js';

export const UNCAUGHT_REASON = 'uncaught execution error';

/**
 * Drives registered test cases through traced runs, one at a time, and keeps
 * every result it produced. A case that blows up becomes a failed result; it
 * never stops the batch.
 */
export class TestHarness {
  private cases = new Map<string, TestCase>();
  private statuses = new Map<string, TestCaseStatus>();
  private history: TestResult[] = [];
  private onEvent?: (event: HarnessEvent) => void;

  constructor(
    private readonly tracer: Tracer,
    private readonly agent: AgentCapability,
    options: HarnessOptions = {}
  ) {
    this.onEvent = options.onEvent;
  }

  addTestCase(testCase: TestCase): void {
    if (this.cases.has(testCase.id)) {
      throw new DuplicateTestCaseError(testCase.id);
    }
    this.cases.set(testCase.id, testCase);
    this.statuses.set(testCase.id, 'pending');
  }

  addTestCases(testCases: readonly TestCase[]): void {
    for (const testCase of testCases) {
      this.addTestCase(testCase);
    }
  }

  getTestCases(): TestCase[] {
    return [...this.cases.values()];
  }

  getStatus(testCaseId: string): TestCaseStatus | undefined {
    return this.statuses.get(testCaseId);
  }

  getResults(): TestResult[] {
    return [...this.history];
  }

  async runTestCase(testCase: TestCase): Promise<TestResult> {
    this.statuses.set(testCase.id, 'running');
    this.emit({ type: 'case:start', testCase });

    const result = await this.execute(testCase);

    this.history.push(result);
    this.statuses.set(testCase.id, result.passed ? 'passed' : 'failed');
    this.emit({ type: 'case:finish', testCase, result });
    return result;
  }

  async runAllTests(): Promise<TestResult[]> {
    const results: TestResult[] = [];
    for (const testCase of this.cases.values()) {
      results.push(await this.runTestCase(testCase));
    }
    return results;
  }

  /** Re-runs every registered case whose latest result failed. */
  async replayFailed(): Promise<TestResult[]> {
    const latest = this.latestResults();
    const results: TestResult[] = [];
    for (const testCase of this.cases.values()) {
      if (latest.get(testCase.id)?.passed === false) {
        results.push(await this.runTestCase(testCase));
      }
    }
    return results;
  }

  getSummary(): HarnessSummary {
    const latest = [...this.latestResults().values()];
    const failuresByCategory = emptyCategoryCounts();
    let passed = 0;
    let totalDuration = 0;

    for (const result of latest) {
      totalDuration += result.durationMs;
      if (result.passed) {
        passed++;
      } else if (result.failureCategory) {
        failuresByCategory[result.failureCategory]++;
      }
    }

    const total = latest.length;
    return {
      total,
      passed,
      failed: total - passed,
      passRate: total > 0 ? passed / total : 0,
      failuresByCategory,
      averageDurationMs: total > 0 ? totalDuration / total : 0,
    };
  }

  private async execute(testCase: TestCase): Promise<TestResult> {
    const startTime = Date.now();
    const started: { handle?: RunHandle } = {};

    try {
      const execution = await executeTraced(this.tracer, this.agent, testCase.query, {
        metadata: { ...testCase.metadata, testCaseId: testCase.id },
        onStart: handle => {
          started.handle = handle;
        },
      });
      const tools = toolsUsed(execution.steps);
      const base = {
        testCaseId: testCase.id,
        runId: execution.run.id,
        actualToolsUsed: tools,
        actualErrorKind: execution.run.errorKind,
        actualOutput: execution.output,
        durationMs: Date.now() - startTime,
        finishedAt: new Date().toISOString(),
      };

      if (execution.uncaught) {
        // The run keeps its classified kind; the result reports a harness-level failure.
        return {
          ...base,
          actualErrorKind: 'unknown',
          passed: false,
          failureReasons: [UNCAUGHT_REASON],
          failureCategory: 'uncaught_error',
        };
      }
      return { ...base, ...gradeRun(testCase, execution.run, tools) };
    } catch (error) {
      if (!(error instanceof StorageError)) {
        throw error;
      }
      return {
        testCaseId: testCase.id,
        runId: started.handle?.runId ?? null,
        passed: false,
        failureReasons: [`storage error: ${errorMessage(error)}`],
        failureCategory: 'storage_error',
        actualToolsUsed: [],
        actualErrorKind: null,
        actualOutput: null,
        durationMs: Date.now() - startTime,
        finishedAt: new Date().toISOString(),
      };
    }
  }

  private latestResults(): Map<string, TestResult> {
    const latest = new Map<string, TestResult>();
    for (const result of this.history) {
      latest.set(result.testCaseId, result);
    }
    return latest;
  }

  private emit(event: HarnessEvent): void {
    this.onEvent?.(event);
  }
}

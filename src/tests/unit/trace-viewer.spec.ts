import { describe, expect, it } from 'vitest';

import { emptyErrorKindCounts } from '../../classifier/types.js';
import {
  formatDuration,
  formatMetrics,
  formatPercent,
  formatRun,
  formatRunList,
  stripAnsi,
} from '../../observability/trace-viewer.js';
import type { Run, Step } from '../../observability/types.js';

const run: Run = {
  id: '0f3c2a9e-1111-4222-8333-444455556666',
  query: 'Calculate 1+1',
  status: 'success',
  startedAt: '2026-03-01T10:00:00.000Z',
  endedAt: '2026-03-01T10:00:01.500Z',
  finalOutput: 'Result: 1+1 = 2',
  errorKind: null,
  errorMessage: null,
  metadata: {},
};

const steps: Step[] = [
  {
    type: 'tool_call',
    payload: { tool: 'calculate', args: { expression: '1+1' } },
    runId: run.id,
    index: 0,
    timestamp: '2026-03-01T10:00:00.100Z',
  },
  {
    type: 'tool_result',
    payload: { tool: 'calculate', result: 'Result: 1+1 = 2', durationMs: 12 },
    runId: run.id,
    index: 1,
    timestamp: '2026-03-01T10:00:00.112Z',
  },
];

describe('formatRun', () => {
  it('renders the run header and step tree without color', () => {
    const lines = formatRun(run, steps, { color: false }).split('\n');

    expect(lines).toContain(`  Run ${run.id}`);
    expect(lines).toContain('   Query: Calculate 1+1');
    expect(lines).toContain('   Status: ✓ success');
    expect(lines).toContain('   Duration: 1.5s');
    expect(lines).toContain('   Output: Result: 1+1 = 2');
    expect(lines).toContain(`─── Steps (2) ${'─'.repeat(26)}`);
    expect(lines).toContain('   ├─ #0 call calculate');
    expect(lines).toContain('   └─ #1 result calculate (12ms)');
    expect(lines.some(line => line.includes('args:'))).toBe(false);
  });

  it('adds step details in verbose mode', () => {
    const lines = formatRun(run, steps, { color: false, verbose: true }).split('\n');

    expect(lines).toContain('   │     args: {"expression":"1+1"}');
    expect(lines).toContain('         result: "Result: 1+1 = 2"');
  });

  it('shows failures and in-flight runs', () => {
    const failed: Run = { ...run, status: 'failed', finalOutput: null, errorKind: 'timeout', errorMessage: 'timed out' };
    const failedLines = formatRun(failed, [], { color: false }).split('\n');
    expect(failedLines).toContain('   Status: ✗ failed');
    expect(failedLines).toContain('   Error kind: timeout');
    expect(failedLines).toContain('   Error: timed out');
    expect(failedLines).toContain('   (no steps recorded)');

    const running: Run = { ...run, status: 'running', endedAt: null, finalOutput: null };
    expect(formatRun(running, [], { color: false }).split('\n')).toContain('   Duration: in progress');
  });

  it('emits the run and steps as JSON', () => {
    expect(JSON.parse(formatRun(run, steps, { json: true }))).toEqual({ run, steps });
  });
});

describe('formatRunList', () => {
  it('prints one row per run and the follow-up hint', () => {
    const lines = stripAnsi(formatRunList([run])).split('\n');

    expect(lines.some(line => line.startsWith('  0f3c2a9e  ✓ success'))).toBe(true);
    expect(lines).toContain('  View a run: stepwise trace <run-id>');
  });
});

describe('formatMetrics', () => {
  it('lists only the error kinds that occurred', () => {
    const errorKinds = { ...emptyErrorKindCounts(), not_found: 2 };
    const text = stripAnsi(
      formatMetrics({
        totalRuns: 5,
        finishedRuns: 4,
        inProgress: 1,
        succeeded: 2,
        failed: 2,
        successRate: 0.5,
        errorKinds,
        averageDurationMs: 250,
      })
    );
    const lines = text.split('\n');

    expect(lines).toContain('   Success rate: 50.0%');
    expect(lines).toContain('   Avg duration: 250ms');
    expect(lines).toContain(`   • ${'not_found'.padEnd(18)} 2`);
    expect(text).not.toContain('timeout');
  });
});

describe('formatDuration and formatPercent', () => {
  it.each([
    [999, '999ms'],
    [1500, '1.5s'],
    [125000, '2m 5s'],
  ])('formats %d ms as %s', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });

  it('formats rates with one decimal', () => {
    expect(formatPercent(5 / 6)).toBe('83.3%');
    expect(formatPercent(0)).toBe('0.0%');
  });
});

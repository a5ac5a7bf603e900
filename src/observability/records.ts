import { randomUUID } from 'crypto';
import { emptyErrorKindCounts } from '../classifier/types.js';
import { InvalidRunStateError, StorageError, UnknownRunError } from '../errors.js';
import type {
  MetricsSnapshot,
  Run,
  RunFilter,
  RunOutcome,
  Step,
  StepEntry,
  TimeRange,
} from './types.js';

export function createRunRecord(query: string, metadata: Record<string, unknown> = {}): Run {
  return {
    id: randomUUID(),
    query,
    status: 'running',
    startedAt: new Date().toISOString(),
    endedAt: null,
    finalOutput: null,
    errorKind: null,
    errorMessage: null,
    metadata: { ...metadata },
  };
}

export function createStepRecord(run: Run, index: number, entry: StepEntry): Step {
  assertAppendable(run);
  return {
    ...entry,
    runId: run.id,
    index,
    timestamp: new Date().toISOString(),
  };
}

export function assertAppendable(run: Run): void {
  if (run.status !== 'running') {
    throw new InvalidRunStateError(run.id, `Run ${run.id} is already finalized (${run.status})`);
  }
}

export function finalizeRecord(run: Run, outcome: RunOutcome): Run {
  if (run.status !== 'running') {
    throw new InvalidRunStateError(
      run.id,
      `Run ${run.id} was already finalized as ${run.status}`
    );
  }

  const endedAt = new Date().toISOString();
  if (outcome.status === 'success') {
    return { ...run, status: 'success', endedAt, finalOutput: outcome.finalOutput };
  }
  return {
    ...run,
    status: 'failed',
    endedAt,
    errorKind: outcome.errorKind,
    errorMessage: outcome.errorMessage ?? null,
  };
}

export function runDuration(run: Run): number | null {
  if (!run.endedAt) {
    return null;
  }
  return Math.max(0, new Date(run.endedAt).getTime() - new Date(run.startedAt).getTime());
}

export function inRange(run: Run, range?: TimeRange): boolean {
  if (!range) return true;
  const started = new Date(run.startedAt).getTime();
  if (range.from && started < range.from.getTime()) return false;
  if (range.to && started > range.to.getTime()) return false;
  return true;
}

export function applyFilter(runs: Run[], filter: RunFilter = {}): Run[] {
  const matching = runs
    .filter(run => !filter.status || run.status === filter.status)
    .filter(run => inRange(run, filter.range))
    .sort(newestFirst);

  return filter.limit !== undefined ? matching.slice(0, Math.max(0, filter.limit)) : matching;
}

export function newestFirst(a: Run, b: Run): number {
  return new Date(b.startedAt).getTime() - new Date(a.startedAt).getTime();
}

/**
 * Aggregates run history. In-flight runs only count towards `inProgress`
 * and `totalRuns`; rates and durations cover finished runs.
 */
export function summarizeRuns(runs: Run[]): MetricsSnapshot {
  const errorKinds = emptyErrorKindCounts();
  let succeeded = 0;
  let failed = 0;
  let inProgress = 0;
  let durationTotal = 0;

  for (const run of runs) {
    if (run.status === 'running') {
      inProgress++;
      continue;
    }
    if (run.status === 'success') {
      succeeded++;
    } else {
      failed++;
      errorKinds[run.errorKind ?? 'unknown']++;
    }
    durationTotal += runDuration(run) ?? 0;
  }

  const finishedRuns = succeeded + failed;

  return {
    totalRuns: runs.length,
    finishedRuns,
    inProgress,
    succeeded,
    failed,
    successRate: finishedRuns > 0 ? succeeded / finishedRuns : 0,
    errorKinds,
    averageDurationMs: finishedRuns > 0 ? durationTotal / finishedRuns : 0,
  };
}

/** Finished runs outside the newest `keepCount`. Running runs are never candidates. */
export function pruneCandidates(runs: Run[], keepCount: number): Run[] {
  return [...runs]
    .sort(newestFirst)
    .slice(Math.max(0, keepCount))
    .filter(run => run.status !== 'running');
}

export function resolvePrefix(runs: Run[], idOrPrefix: string): Run | null {
  const exact = runs.find(run => run.id === idOrPrefix);
  if (exact) {
    return exact;
  }

  const matches = runs.filter(run => run.id.startsWith(idOrPrefix));
  if (matches.length > 1) {
    throw new UnknownRunError(
      idOrPrefix,
      `Run prefix ${idOrPrefix} is ambiguous (${matches.length} matches)`
    );
  }
  return matches[0] ?? null;
}

export function cloneRecord<T>(value: T): T {
  try {
    return structuredClone(value);
  } catch (error) {
    throw new StorageError(
      `Record is not serializable: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
}

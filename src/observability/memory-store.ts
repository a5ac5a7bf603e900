import { StorageError, UnknownRunError } from '../errors.js';
import { KeyedQueue } from '../utils/keyed-queue.js';
import {
  applyFilter,
  cloneRecord,
  createRunRecord,
  createStepRecord,
  finalizeRecord,
  inRange,
  pruneCandidates,
  resolvePrefix,
  summarizeRuns,
} from './records.js';
import type {
  MetricsSnapshot,
  Run,
  RunFilter,
  RunOutcome,
  Step,
  StepEntry,
  TimeRange,
  TraceStore,
} from './types.js';

/**
 * In-process trace store. Every record handed in or out is a copy, so
 * callers can never mutate stored history.
 */
export class MemoryTraceStore implements TraceStore {
  private runs = new Map<string, Run>();
  private steps = new Map<string, Step[]>();
  private queue = new KeyedQueue();
  private closed = false;

  async createRun(query: string, metadata?: Record<string, unknown>): Promise<string> {
    this.ensureOpen();
    const run = cloneRecord(createRunRecord(query, metadata));
    this.runs.set(run.id, run);
    this.steps.set(run.id, []);
    return run.id;
  }

  appendStep(runId: string, entry: StepEntry): Promise<number> {
    return this.queue.run(runId, async () => {
      this.ensureOpen();
      const run = this.requireRun(runId);
      const steps = this.steps.get(runId) ?? [];
      const step = cloneRecord(createStepRecord(run, steps.length, entry));
      steps.push(step);
      this.steps.set(runId, steps);
      return step.index;
    });
  }

  finalizeRun(runId: string, outcome: RunOutcome): Promise<Run> {
    return this.queue.run(runId, async () => {
      this.ensureOpen();
      const finalized = finalizeRecord(this.requireRun(runId), outcome);
      this.runs.set(runId, finalized);
      return cloneRecord(finalized);
    });
  }

  async getRun(runId: string): Promise<Run> {
    this.ensureOpen();
    return cloneRecord(this.requireRun(runId));
  }

  async getSteps(runId: string): Promise<Step[]> {
    this.ensureOpen();
    this.requireRun(runId);
    return cloneRecord(this.steps.get(runId) ?? []);
  }

  async findRun(idOrPrefix: string): Promise<Run | null> {
    this.ensureOpen();
    const run = resolvePrefix([...this.runs.values()], idOrPrefix);
    return run ? cloneRecord(run) : null;
  }

  async listRuns(filter?: RunFilter): Promise<Run[]> {
    this.ensureOpen();
    return cloneRecord(applyFilter([...this.runs.values()], filter));
  }

  async computeMetrics(range?: TimeRange): Promise<MetricsSnapshot> {
    this.ensureOpen();
    return summarizeRuns([...this.runs.values()].filter(run => inRange(run, range)));
  }

  async prune(keepCount: number): Promise<number> {
    this.ensureOpen();
    const candidates = pruneCandidates([...this.runs.values()], keepCount);
    for (const run of candidates) {
      this.runs.delete(run.id);
      this.steps.delete(run.id);
    }
    return candidates.length;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private requireRun(runId: string): Run {
    const run = this.runs.get(runId);
    if (!run) {
      throw new UnknownRunError(runId);
    }
    return run;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new StorageError('Trace store is closed');
    }
  }
}

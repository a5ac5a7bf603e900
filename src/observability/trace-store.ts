import { mkdir, readdir, readFile, rename, unlink, writeFile } from 'fs/promises';
import { randomUUID } from 'crypto';
import { join } from 'path';
import { isErrorKind } from '../classifier/types.js';
import { StepwiseError, StorageError, UnknownRunError } from '../errors.js';
import { isRecord } from '../utils/guards.js';
import { KeyedQueue } from '../utils/keyed-queue.js';
import { MemoryTraceStore } from './memory-store.js';
import {
  applyFilter,
  createRunRecord,
  createStepRecord,
  finalizeRecord,
  inRange,
  pruneCandidates,
  resolvePrefix,
  summarizeRuns,
} from './records.js';
import {
  STEP_TYPES,
  type MetricsSnapshot,
  type Run,
  type RunFilter,
  type RunOutcome,
  type Step,
  type StepEntry,
  type TimeRange,
  type TraceStore,
} from './types.js';

export const DEFAULT_TRACES_DIR = '.stepwise/traces';

const RUN_ID_PATTERN = /^[A-Za-z0-9-]+$/;

interface RunDocument {
  run: Run;
  steps: Step[];
}

/**
 * One JSON document per run under `<dir>/runs`. Documents are written to a
 * temporary file and renamed into place, so a reader sees either the old
 * or the new document and never a half-written step.
 */
export class FileTraceStore implements TraceStore {
  private readonly runsDir: string;
  private queue = new KeyedQueue();
  private closed = false;

  constructor(tracesDir: string = DEFAULT_TRACES_DIR) {
    this.runsDir = join(tracesDir, 'runs');
  }

  async createRun(query: string, metadata?: Record<string, unknown>): Promise<string> {
    this.ensureOpen();
    const run = createRunRecord(query, metadata);
    await this.storage('create run', async () => {
      await mkdir(this.runsDir, { recursive: true });
      await this.write({ run, steps: [] });
    });
    return run.id;
  }

  appendStep(runId: string, entry: StepEntry): Promise<number> {
    return this.queue.run(runId, async () => {
      this.ensureOpen();
      const doc = await this.read(runId);
      const step = createStepRecord(doc.run, doc.steps.length, entry);
      await this.write({ run: doc.run, steps: [...doc.steps, step] });
      return step.index;
    });
  }

  finalizeRun(runId: string, outcome: RunOutcome): Promise<Run> {
    return this.queue.run(runId, async () => {
      this.ensureOpen();
      const doc = await this.read(runId);
      const run = finalizeRecord(doc.run, outcome);
      await this.write({ run, steps: doc.steps });
      return run;
    });
  }

  async getRun(runId: string): Promise<Run> {
    this.ensureOpen();
    return (await this.read(runId)).run;
  }

  async getSteps(runId: string): Promise<Step[]> {
    this.ensureOpen();
    const { steps } = await this.read(runId);
    return [...steps].sort((a, b) => a.index - b.index);
  }

  async findRun(idOrPrefix: string): Promise<Run | null> {
    this.ensureOpen();
    return resolvePrefix(await this.loadAll(), idOrPrefix);
  }

  async listRuns(filter?: RunFilter): Promise<Run[]> {
    this.ensureOpen();
    return applyFilter(await this.loadAll(), filter);
  }

  async computeMetrics(range?: TimeRange): Promise<MetricsSnapshot> {
    this.ensureOpen();
    const runs = await this.loadAll();
    return summarizeRuns(runs.filter(run => inRange(run, range)));
  }

  async prune(keepCount: number): Promise<number> {
    this.ensureOpen();
    const candidates = pruneCandidates(await this.loadAll(), keepCount);

    let deleted = 0;
    for (const run of candidates) {
      const removed = await this.queue.run(run.id, () =>
        this.storage('prune run', async () => {
          try {
            await unlink(this.pathFor(run.id));
            return true;
          } catch (error) {
            if (isMissingFile(error)) return false;
            throw error;
          }
        })
      );
      if (removed) deleted++;
    }
    return deleted;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private async loadAll(): Promise<Run[]> {
    const files = await this.storage('list runs', async () => {
      try {
        return await readdir(this.runsDir);
      } catch (error) {
        if (isMissingFile(error)) return [];
        throw error;
      }
    });

    const runs: Run[] = [];
    for (const file of files.filter(f => f.endsWith('.json'))) {
      const runId = file.slice(0, -'.json'.length);
      try {
        runs.push((await this.read(runId)).run);
      } catch (error) {
        // Pruned between readdir and read.
        if (error instanceof UnknownRunError) continue;
        throw error;
      }
    }
    return runs;
  }

  private async read(runId: string): Promise<RunDocument> {
    if (!RUN_ID_PATTERN.test(runId)) {
      throw new UnknownRunError(runId);
    }
    const path = this.pathFor(runId);

    const content = await this.storage(`read run ${runId}`, async () => {
      try {
        return await readFile(path, 'utf-8');
      } catch (error) {
        if (isMissingFile(error)) throw new UnknownRunError(runId);
        throw error;
      }
    });

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new StorageError(`Corrupt trace document: ${path}`, error);
    }
    validateDocument(parsed, path);
    return parsed;
  }

  private async write(doc: RunDocument): Promise<void> {
    const target = this.pathFor(doc.run.id);
    const temp = `${target}.${randomUUID()}.tmp`;
    await this.storage(`write run ${doc.run.id}`, async () => {
      try {
        await writeFile(temp, JSON.stringify(doc, null, 2));
        await rename(temp, target);
      } catch (error) {
        await unlink(temp).catch((cleanup: unknown) => {
          if (!isMissingFile(cleanup)) throw cleanup;
        });
        throw error;
      }
    });
  }

  private pathFor(runId: string): string {
    return join(this.runsDir, `${runId}.json`);
  }

  private async storage<T>(action: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (error instanceof StepwiseError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new StorageError(`Failed to ${action}: ${message}`, error);
    }
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new StorageError('Trace store is closed');
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function validateDocument(doc: unknown, path: string): asserts doc is RunDocument {
  if (!isRecord(doc)) {
    throw new StorageError(`Corrupt trace document (not an object): ${path}`);
  }

  const run = doc.run;
  if (!isRecord(run) || typeof run.id !== 'string' || typeof run.startedAt !== 'string') {
    throw new StorageError(`Corrupt trace document (bad run record): ${path}`);
  }
  if (run.status !== 'running' && run.status !== 'success' && run.status !== 'failed') {
    throw new StorageError(`Corrupt trace document (bad run status): ${path}`);
  }
  if (run.errorKind !== null && !isErrorKind(run.errorKind)) {
    throw new StorageError(`Corrupt trace document (bad error kind): ${path}`);
  }
  if (!Array.isArray(doc.steps)) {
    throw new StorageError(`Corrupt trace document (steps missing): ${path}`);
  }

  doc.steps.forEach((step: unknown, position: number) => {
    const type = isRecord(step) ? step.type : undefined;
    if (!isRecord(step) || step.index !== position || !STEP_TYPES.some(known => known === type)) {
      throw new StorageError(`Corrupt trace document (bad step ${position}): ${path}`);
    }
  });
}

export interface TraceStoreOptions {
  driver: 'file' | 'memory';
  dir?: string;
}

export function createTraceStore(options: TraceStoreOptions): TraceStore {
  switch (options.driver) {
    case 'memory':
      return new MemoryTraceStore();
    case 'file':
      return new FileTraceStore(options.dir ?? DEFAULT_TRACES_DIR);
  }
}

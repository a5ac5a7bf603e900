import { classifyError, errorMessage } from '../classifier/classifier.js';
import type { Classifier, ErrorKind } from '../classifier/types.js';
import type {
  MetricsSnapshot,
  Run,
  StepEntry,
  StepPayloads,
  TimeRange,
  TraceStore,
} from './types.js';

export interface RecordedError {
  kind: ErrorKind;
  message: string;
  tool?: string;
  raw: unknown;
}

export interface TracerOptions {
  classifier?: Classifier;
}

/**
 * What agent and tool code is given to report progress on one run.
 */
export interface TracingHook {
  readonly runId: string;
  readonly query: string;
  reasoning(text: string): Promise<number>;
  toolCall(tool: string, args: Record<string, unknown>): Promise<number>;
  toolResult(tool: string, result: unknown, durationMs?: number): Promise<number>;
  finalAnswer(output: string): Promise<number>;
  error(raw: unknown, tool?: string): Promise<ErrorKind>;
  tool<T>(tool: string, args: Record<string, unknown>, fn: () => Promise<T> | T): Promise<T>;
}

export class RunHandle implements TracingHook {
  private _finished = false;
  private _lastError: RecordedError | undefined;
  private _errors = new Set<unknown>();

  constructor(
    private readonly tracer: Tracer,
    readonly runId: string,
    readonly query: string
  ) {}

  get finished(): boolean {
    return this._finished;
  }

  get lastError(): RecordedError | undefined {
    return this._lastError;
  }

  /** True when `raw` was already routed through `recordError` on this handle. */
  hasRecorded(raw: unknown): boolean {
    return this._errors.has(raw);
  }

  reasoning(text: string): Promise<number> {
    return this.tracer.recordStep(this, { type: 'reasoning', payload: { text } });
  }

  toolCall(tool: string, args: Record<string, unknown>): Promise<number> {
    return this.tracer.recordStep(this, { type: 'tool_call', payload: { tool, args } });
  }

  toolResult(tool: string, result: unknown, durationMs?: number): Promise<number> {
    const payload: StepPayloads['tool_result'] =
      durationMs === undefined ? { tool, result } : { tool, result, durationMs };
    return this.tracer.recordStep(this, { type: 'tool_result', payload });
  }

  finalAnswer(output: string): Promise<number> {
    return this.tracer.recordStep(this, { type: 'final_answer', payload: { output } });
  }

  error(raw: unknown, tool?: string): Promise<ErrorKind> {
    return this.tracer.recordError(this, raw, tool);
  }

  tool<T>(tool: string, args: Record<string, unknown>, fn: () => Promise<T> | T): Promise<T> {
    return this.tracer.traceTool(this, tool, args, fn);
  }

  /** @internal */
  noteError(error: RecordedError): void {
    this._lastError = error;
    this._errors.add(error.raw);
  }

  /** @internal */
  markFinished(): void {
    this._finished = true;
  }
}

/**
 * The writer-facing API over a trace store. Step numbering belongs to the
 * store; callers only ever hold a handle.
 */
export class Tracer {
  private readonly classify: Classifier;

  constructor(
    private readonly store: TraceStore,
    options: TracerOptions = {}
  ) {
    this.classify = options.classifier ?? classifyError;
  }

  get traceStore(): TraceStore {
    return this.store;
  }

  async startRun(query: string, metadata?: Record<string, unknown>): Promise<RunHandle> {
    const runId = await this.store.createRun(query, metadata);
    return new RunHandle(this, runId, query);
  }

  recordStep(handle: RunHandle, entry: StepEntry): Promise<number> {
    return this.store.appendStep(handle.runId, entry);
  }

  async recordError(handle: RunHandle, raw: unknown, tool?: string): Promise<ErrorKind> {
    const kind = this.classify(raw);
    const message = errorMessage(raw) || 'Unknown error';
    const payload: StepPayloads['error'] = tool === undefined ? { kind, message } : { kind, message, tool };

    await this.store.appendStep(handle.runId, { type: 'error', payload });
    handle.noteError({ kind, message, tool, raw });
    return kind;
  }

  async finishSuccess(handle: RunHandle, finalOutput: string): Promise<Run> {
    const run = await this.store.finalizeRun(handle.runId, { status: 'success', finalOutput });
    handle.markFinished();
    return run;
  }

  async finishFailure(handle: RunHandle, errorKind: ErrorKind, message?: string): Promise<Run> {
    const run = await this.store.finalizeRun(handle.runId, {
      status: 'failed',
      errorKind,
      errorMessage: message ?? handle.lastError?.message,
    });
    handle.markFinished();
    return run;
  }

  /**
   * Records a tool invocation around `fn`: a tool_call step, then either a
   * tool_result step or a classified error step. Errors are rethrown as-is.
   */
  async traceTool<T>(
    handle: RunHandle,
    tool: string,
    args: Record<string, unknown>,
    fn: () => Promise<T> | T
  ): Promise<T> {
    await this.recordStep(handle, { type: 'tool_call', payload: { tool, args } });
    const startTime = Date.now();

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      await this.recordError(handle, error, tool);
      throw error;
    }

    await this.recordStep(handle, {
      type: 'tool_result',
      payload: { tool, result, durationMs: Date.now() - startTime },
    });
    return result;
  }

  getMetrics(range?: TimeRange): Promise<MetricsSnapshot> {
    return this.store.computeMetrics(range);
  }
}

export function createTracer(store: TraceStore, options?: TracerOptions): Tracer {
  return new Tracer(store, options);
}

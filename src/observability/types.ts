import type { ErrorKind } from '../classifier/types.js';

export type RunStatus = 'running' | 'success' | 'failed';

export interface Run {
  id: string;
  query: string;
  status: RunStatus;
  startedAt: string;
  endedAt: string | null;
  finalOutput: string | null;
  errorKind: ErrorKind | null;
  errorMessage: string | null;
  metadata: Record<string, unknown>;
}

export interface StepPayloads {
  reasoning: { text: string };
  tool_call: { tool: string; args: Record<string, unknown> };
  tool_result: { tool: string; result: unknown; durationMs?: number };
  error: { kind: ErrorKind; message: string; tool?: string };
  final_answer: { output: string };
}

export type StepType = keyof StepPayloads;

export const STEP_TYPES: readonly StepType[] = [
  'reasoning',
  'tool_call',
  'tool_result',
  'error',
  'final_answer',
];

/** What a caller hands to the tracer: a step without its index. */
export type StepEntry = {
  [K in StepType]: { type: K; payload: StepPayloads[K] };
}[StepType];

export type Step = StepEntry & {
  runId: string;
  index: number;
  timestamp: string;
};

export type RunOutcome =
  | { status: 'success'; finalOutput: string }
  | { status: 'failed'; errorKind: ErrorKind; errorMessage?: string };

export interface TimeRange {
  from?: Date;
  to?: Date;
}

export interface RunFilter {
  status?: RunStatus;
  range?: TimeRange;
  limit?: number;
}

export interface MetricsSnapshot {
  totalRuns: number;
  finishedRuns: number;
  inProgress: number;
  succeeded: number;
  failed: number;
  successRate: number;
  errorKinds: Record<ErrorKind, number>;
  averageDurationMs: number;
}

export interface TraceStore {
  createRun(query: string, metadata?: Record<string, unknown>): Promise<string>;
  appendStep(runId: string, entry: StepEntry): Promise<number>;
  finalizeRun(runId: string, outcome: RunOutcome): Promise<Run>;
  getRun(runId: string): Promise<Run>;
  getSteps(runId: string): Promise<Step[]>;
  findRun(idOrPrefix: string): Promise<Run | null>;
  listRuns(filter?: RunFilter): Promise<Run[]>;
  computeMetrics(range?: TimeRange): Promise<MetricsSnapshot>;
  prune(keepCount: number): Promise<number>;
  close(): Promise<void>;
}

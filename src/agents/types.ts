import type { TracingHook } from '../observability/tracer.js';

/**
 * Anything that can answer a query while reporting its steps through the
 * hook it is handed. Resolving means success, throwing means failure.
 */
export interface AgentCapability {
  readonly name: string;
  run(query: string, hook: TracingHook, metadata?: Record<string, unknown>): Promise<string>;
}

export type AgentKind = 'mock' | 'claude';

export interface AgentOptions {
  kind: AgentKind;
  model: string;
  maxTokens: number;
  maxIterations: number;
  /** Tool name to error message; the tool raises it instead of running. */
  faults?: Record<string, string>;
}

import type { Run, Step } from '../observability/types.js';
import type { RunHandle, Tracer } from '../observability/tracer.js';
import type { AgentCapability } from './types.js';

export interface TracedExecution {
  run: Run;
  steps: Step[];
  output: string | null;
  /** The agent threw without routing the failure through its hook first. */
  uncaught: boolean;
  durationMs: number;
}

export interface ExecuteOptions {
  metadata?: Record<string, unknown>;
  onStart?: (handle: RunHandle) => void;
}

/**
 * Starts a traced run, hands it to the agent, and finalizes it from what the
 * agent did. Storage failures propagate; agent failures end up on the run.
 */
export async function executeTraced(
  tracer: Tracer,
  agent: AgentCapability,
  query: string,
  options: ExecuteOptions = {}
): Promise<TracedExecution> {
  const startTime = Date.now();
  const handle = await tracer.startRun(query, options.metadata);
  options.onStart?.(handle);

  let output: string | null = null;
  let uncaught = false;

  try {
    output = await agent.run(query, handle, options.metadata);
  } catch (error) {
    uncaught = !handle.hasRecorded(error);
    if (uncaught && !handle.finished) {
      await tracer.recordError(handle, error);
    }
  }

  if (!handle.finished) {
    if (output !== null) {
      await tracer.recordStep(handle, { type: 'final_answer', payload: { output } });
      await tracer.finishSuccess(handle, output);
    } else {
      const failure = handle.lastError;
      await tracer.finishFailure(handle, failure?.kind ?? 'unknown', failure?.message);
    }
  }

  const store = tracer.traceStore;
  const [run, steps] = await Promise.all([store.getRun(handle.runId), store.getSteps(handle.runId)]);

  return {
    run,
    steps,
    output: run.status === 'success' ? run.finalOutput : null,
    uncaught,
    durationMs: Date.now() - startTime,
  };
}

export function toolsUsed(steps: Step[]): string[] {
  const seen = new Set<string>();
  for (const step of steps) {
    if (step.type === 'tool_call') {
      seen.add(step.payload.tool);
    }
  }
  return [...seen];
}

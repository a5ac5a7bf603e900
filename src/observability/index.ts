export * from './types.js';
export { Tracer, RunHandle, createTracer, type TracingHook, type TracerOptions, type RecordedError } from './tracer.js';
export {
  FileTraceStore,
  createTraceStore,
  DEFAULT_TRACES_DIR,
  type TraceStoreOptions,
} from './trace-store.js';
export { MemoryTraceStore } from './memory-store.js';
export { summarizeRuns, runDuration } from './records.js';
export {
  formatRun,
  formatRunList,
  formatMetrics,
  formatDuration,
  formatPercent,
  stripAnsi,
  type ViewOptions,
} from './trace-viewer.js';

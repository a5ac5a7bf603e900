import { InvalidArgumentError, type Command } from 'commander';
import { createAgent } from '../agents/index.js';
import type { AgentCapability, AgentKind } from '../agents/types.js';
import { buildClassifier, loadConfig, type StepwiseConfig } from '../config/index.js';
import {
  ConfigError,
  DuplicateTestCaseError,
  StorageError,
  TestCaseFormatError,
  UnknownRunError,
} from '../errors.js';
import { createTraceStore, createTracer, type Tracer, type TraceStore } from '../observability/index.js';
import { debug, formatError, style } from './theme.js';

export interface CliContext {
  config: StepwiseConfig;
  store: TraceStore;
  tracer: Tracer;
  agent: AgentCapability;
}

interface GlobalOptions {
  config?: string;
}

export interface ContextOverrides {
  agent?: AgentKind;
}

export function createContext(command: Command, overrides: ContextOverrides = {}): CliContext {
  const { config: configPath } = command.optsWithGlobals<GlobalOptions>();
  const config = loadConfig({ path: configPath });
  const agentConfig = overrides.agent ? { ...config.agent, kind: overrides.agent } : config.agent;

  debug(`store: ${config.store.driver} (${config.store.dir}), agent: ${agentConfig.kind}`);

  const store = createTraceStore(config.store);
  const tracer = createTracer(store, { classifier: buildClassifier(config) });
  return { config, store, tracer, agent: createAgent(agentConfig) };
}

/** Opens a context for one command and closes its store afterwards. */
export async function withContext<T>(
  command: Command,
  overrides: ContextOverrides,
  fn: (ctx: CliContext) => Promise<T>
): Promise<T> {
  const ctx = createContext(command, overrides);
  try {
    return await fn(ctx);
  } finally {
    await ctx.store.close();
  }
}

export function failCommand(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.log(formatError(message, suggestionsFor(error)));
  if (error instanceof Error && error.stack) {
    debug(error.stack);
  }
  process.exit(1);
}

function suggestionsFor(error: unknown): string[] {
  if (error instanceof UnknownRunError) {
    return [
      `Run ${style.command('stepwise history')} to see recorded runs`,
      'Use a longer id prefix if it is ambiguous',
    ];
  }
  if (error instanceof ConfigError) {
    return ['Check stepwise.config.yaml or the file passed with --config'];
  }
  if (error instanceof TestCaseFormatError || error instanceof DuplicateTestCaseError) {
    return ['Each case needs a unique id and a query', 'See cases/default.yaml for the format'];
  }
  if (error instanceof StorageError) {
    return ['Check that the trace directory is writable', 'Set STEPWISE_STORE_DIR to use another location'];
  }
  return [];
}

export function parseAgentKind(value: string): AgentKind {
  if (value !== 'mock' && value !== 'claude') {
    throw new InvalidArgumentError('Expected "mock" or "claude".');
  }
  return value;
}

export function parseDate(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(`Not a valid date: ${value}`);
  }
  return date;
}

export function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return count;
}

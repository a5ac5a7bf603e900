import type { ClassificationRule } from '../classifier/types.js';
import type { AgentKind } from '../agents/types.js';

export type StoreDriver = 'file' | 'memory';

export interface StoreConfig {
  driver: StoreDriver;
  dir: string;
}

export interface AgentConfig {
  kind: AgentKind;
  model: string;
  maxTokens: number;
  maxIterations: number;
  /** Tool name to error message, for exercising failure paths. */
  faults: Record<string, string>;
}

export interface ClassifierConfig {
  /** Checked before the built-in rules. */
  rules: ClassificationRule[];
}

export interface HarnessConfig {
  resultsDir: string;
}

export interface StepwiseConfig {
  store: StoreConfig;
  agent: AgentConfig;
  classifier: ClassifierConfig;
  harness: HarnessConfig;
}

export const DEFAULT_CONFIG_FILE = 'stepwise.config.yaml';

export const DEFAULT_CONFIG: StepwiseConfig = {
  store: { driver: 'file', dir: '.stepwise/traces' },
  agent: {
    kind: 'mock',
    model: 'claude-sonnet-4-20250514',
    maxTokens: 1024,
    maxIterations: 5,
    faults: {},
  },
  classifier: { rules: [] },
  harness: { resultsDir: '.stepwise/results' },
};

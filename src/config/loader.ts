import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import yaml from 'js-yaml';
import { isErrorKind, type ClassificationRule } from '../classifier/types.js';
import { DEFAULT_RULES } from '../classifier/rules.js';
import { createClassifier } from '../classifier/classifier.js';
import type { Classifier } from '../classifier/types.js';
import { ConfigError } from '../errors.js';
import { isRecord } from '../utils/guards.js';
import {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  type AgentConfig,
  type ClassifierConfig,
  type HarnessConfig,
  type StepwiseConfig,
  type StoreConfig,
} from './types.js';

export interface LoadConfigOptions {
  /** Explicit config file; it must exist. */
  path?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(options: LoadConfigOptions = {}): StepwiseConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let configPath: string | null = null;
  if (options.path) {
    configPath = resolve(cwd, options.path);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${options.path}`);
    }
  } else if (existsSync(resolve(cwd, DEFAULT_CONFIG_FILE))) {
    configPath = resolve(cwd, DEFAULT_CONFIG_FILE);
  }

  let raw: unknown = {};
  if (configPath) {
    const content = readFileSync(configPath, 'utf-8');
    try {
      raw = yaml.load(content) ?? {};
    } catch (e) {
      throw new ConfigError(`Invalid YAML in ${configPath}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  return applyEnvOverrides(parseConfig(raw), env);
}

export function parseConfig(raw: unknown): StepwiseConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Config must be a mapping');
  }

  return {
    store: parseStore(section(raw, 'store')),
    agent: parseAgent(section(raw, 'agent')),
    classifier: parseClassifier(section(raw, 'classifier')),
    harness: parseHarness(section(raw, 'harness')),
  };
}

export function applyEnvOverrides(config: StepwiseConfig, env: NodeJS.ProcessEnv): StepwiseConfig {
  const store = { ...config.store };
  const agent = { ...config.agent };

  if (env.STEPWISE_STORE_DIR) {
    store.dir = env.STEPWISE_STORE_DIR;
  }
  if (env.STEPWISE_AGENT) {
    if (env.STEPWISE_AGENT !== 'mock' && env.STEPWISE_AGENT !== 'claude') {
      throw new ConfigError(`STEPWISE_AGENT must be "mock" or "claude", got "${env.STEPWISE_AGENT}"`);
    }
    agent.kind = env.STEPWISE_AGENT;
  }
  if (env.STEPWISE_MODEL) {
    agent.model = env.STEPWISE_MODEL;
  }

  return { ...config, store, agent };
}

/** The configured rules take precedence over the built-in table. */
export function buildClassifier(config: StepwiseConfig): Classifier {
  return createClassifier([...config.classifier.rules, ...DEFAULT_RULES]);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ConfigError(`${key} must be a mapping`);
  }
  return value;
}

function parseStore(s: Record<string, unknown>): StoreConfig {
  const driver = s.driver ?? DEFAULT_CONFIG.store.driver;
  if (driver !== 'file' && driver !== 'memory') {
    throw new ConfigError(`store.driver must be "file" or "memory", got ${JSON.stringify(driver)}`);
  }
  return { driver, dir: optionalString(s, 'dir', 'store') ?? DEFAULT_CONFIG.store.dir };
}

function parseAgent(a: Record<string, unknown>): AgentConfig {
  const kind = a.kind ?? DEFAULT_CONFIG.agent.kind;
  if (kind !== 'mock' && kind !== 'claude') {
    throw new ConfigError(`agent.kind must be "mock" or "claude", got ${JSON.stringify(kind)}`);
  }

  const faults: Record<string, string> = {};
  if (a.faults !== undefined && a.faults !== null) {
    if (!isRecord(a.faults)) {
      throw new ConfigError('agent.faults must map tool names to error messages');
    }
    for (const [tool, message] of Object.entries(a.faults)) {
      if (typeof message !== 'string') {
        throw new ConfigError(`agent.faults.${tool} must be a string`);
      }
      faults[tool] = message;
    }
  }

  return {
    kind,
    model: optionalString(a, 'model', 'agent') ?? DEFAULT_CONFIG.agent.model,
    maxTokens: optionalPositiveInt(a, 'maxTokens', 'agent') ?? DEFAULT_CONFIG.agent.maxTokens,
    maxIterations: optionalPositiveInt(a, 'maxIterations', 'agent') ?? DEFAULT_CONFIG.agent.maxIterations,
    faults,
  };
}

function parseClassifier(c: Record<string, unknown>): ClassifierConfig {
  if (c.rules === undefined || c.rules === null) {
    return { rules: [] };
  }
  if (!Array.isArray(c.rules)) {
    throw new ConfigError('classifier.rules must be a list');
  }
  return { rules: c.rules.map((rule, i) => parseRule(rule, i)) };
}

function parseRule(rule: unknown, index: number): ClassificationRule {
  const where = `classifier.rules[${index}]`;
  if (!isRecord(rule)) {
    throw new ConfigError(`${where} must be a mapping`);
  }
  if (!isErrorKind(rule.kind)) {
    throw new ConfigError(`${where}.kind is not a known error kind: ${JSON.stringify(rule.kind)}`);
  }

  const match = typeof rule.match === 'string' ? [rule.match] : rule.match;
  if (!Array.isArray(match) || match.length === 0) {
    throw new ConfigError(`${where}.match must be a string or a non-empty list of strings`);
  }
  const phrases: string[] = [];
  for (const phrase of match) {
    if (typeof phrase !== 'string' || phrase.length === 0) {
      throw new ConfigError(`${where}.match must only contain non-empty strings`);
    }
    phrases.push(phrase);
  }

  const description = typeof rule.description === 'string' ? rule.description : undefined;
  return description === undefined ? { kind: rule.kind, match: phrases } : { kind: rule.kind, match: phrases, description };
}

function parseHarness(h: Record<string, unknown>): HarnessConfig {
  return { resultsDir: optionalString(h, 'resultsDir', 'harness') ?? DEFAULT_CONFIG.harness.resultsDir };
}

function optionalString(obj: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function optionalPositiveInt(obj: Record<string, unknown>, key: string, where: string): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${where}.${key} must be a positive integer`);
  }
  return value;
}

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigError } from '../../errors.js';
import { DEFAULT_CONFIG, buildClassifier, loadConfig, parseConfig } from '../../config/index.js';

describe('parseConfig', () => {
  it('fills every missing field with defaults', () => {
    expect(parseConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads every section', () => {
    const config = parseConfig({
      store: { driver: 'memory', dir: 'traces' },
      agent: { kind: 'claude', model: 'test-model', maxTokens: 512, maxIterations: 3, faults: { calculate: 'boom' } },
      classifier: { rules: [{ kind: 'timeout', match: 'took too long', description: 'slow tools' }] },
      harness: { resultsDir: 'out' },
    });

    expect(config).toEqual({
      store: { driver: 'memory', dir: 'traces' },
      agent: { kind: 'claude', model: 'test-model', maxTokens: 512, maxIterations: 3, faults: { calculate: 'boom' } },
      classifier: { rules: [{ kind: 'timeout', match: ['took too long'], description: 'slow tools' }] },
      harness: { resultsDir: 'out' },
    });
  });

  it.each([
    [{ store: { driver: 'sqlite' } }, 'store.driver must be "file" or "memory", got "sqlite"'],
    [{ agent: { kind: 'gpt' } }, 'agent.kind must be "mock" or "claude", got "gpt"'],
    [{ agent: { maxIterations: 0 } }, 'agent.maxIterations must be a positive integer'],
    [{ agent: { faults: { calculate: 1 } } }, 'agent.faults.calculate must be a string'],
    [{ classifier: { rules: [{ kind: 'meltdown', match: ['x'] }] } }, 'classifier.rules[0].kind is not a known error kind: "meltdown"'],
    [{ classifier: { rules: [{ kind: 'timeout', match: [] }] } }, 'classifier.rules[0].match must be a string or a non-empty list of strings'],
    [{ harness: 'results' }, 'harness must be a mapping'],
    [[], 'Config must be a mapping'],
  ])('rejects %j', (raw, message) => {
    expect(() => parseConfig(raw)).toThrow(ConfigError);
    expect(() => parseConfig(raw)).toThrow(message);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'stepwise-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('uses defaults when there is no config file', () => {
    expect(loadConfig({ cwd: dir, env: {} })).toEqual(DEFAULT_CONFIG);
  });

  it('reads stepwise.config.yaml from the working directory', async () => {
    await writeFile(join(dir, 'stepwise.config.yaml'), 'store:\n  driver: memory\nagent:\n  maxTokens: 2048\n');
    const config = loadConfig({ cwd: dir, env: {} });

    expect(config.store.driver).toBe('memory');
    expect(config.agent.maxTokens).toBe(2048);
    expect(config.agent.kind).toBe('mock');
  });

  it('applies environment overrides last', async () => {
    await writeFile(join(dir, 'custom.yaml'), 'agent:\n  kind: claude\n  model: from-file\n');
    const config = loadConfig({
      cwd: dir,
      path: 'custom.yaml',
      env: { STEPWISE_STORE_DIR: '/tmp/elsewhere', STEPWISE_AGENT: 'mock', STEPWISE_MODEL: 'from-env' },
    });

    expect(config.store.dir).toBe('/tmp/elsewhere');
    expect(config.agent.kind).toBe('mock');
    expect(config.agent.model).toBe('from-env');
  });

  it('rejects a missing explicit file, bad YAML and a bad agent override', async () => {
    expect(() => loadConfig({ cwd: dir, path: 'nope.yaml', env: {} })).toThrow('Config file not found: nope.yaml');

    await writeFile(join(dir, 'stepwise.config.yaml'), 'store: [unclosed');
    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(ConfigError);

    await writeFile(join(dir, 'stepwise.config.yaml'), '');
    expect(() => loadConfig({ cwd: dir, env: { STEPWISE_AGENT: 'gpt' } })).toThrow(
      'STEPWISE_AGENT must be "mock" or "claude", got "gpt"'
    );
  });
});

describe('buildClassifier', () => {
  it('puts configured rules ahead of the defaults', () => {
    const classify = buildClassifier(
      parseConfig({ classifier: { rules: [{ kind: 'rate_limit', match: ['not found'] }] } })
    );
    expect(classify('Customer 1 not found')).toBe('rate_limit');
    expect(classify('division by zero')).toBe('division_by_zero');
  });
});

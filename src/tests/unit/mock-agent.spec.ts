import { describe, expect, it } from 'vitest';

import {
  CLARIFICATION,
  MockAgent,
  detectIntents,
  extractExpression,
  normalizeArithmetic,
} from '../../agents/mock-agent.js';
import { MemoryTraceStore } from '../../observability/memory-store.js';
import { Tracer } from '../../observability/tracer.js';

describe('detectIntents', () => {
  const summary = (query: string) => detectIntents(query).map(({ tool, args }) => ({ tool, args }));

  it('turns spelled-out division into an expression', () => {
    expect(summary('What is 100 divided by 0?')).toEqual([{ tool: 'calculate', args: { expression: '100 / 0' } }]);
  });

  it('detects several tools in one query', () => {
    expect(summary('weather in Tokyo and calculate 50*3')).toEqual([
      { tool: 'get_weather', args: { location: 'Tokyo' } },
      { tool: 'calculate', args: { expression: '50*3' } },
    ]);
  });

  it('extracts customer ids with or without a hash', () => {
    expect(summary('Get information for customer #67890')).toEqual([
      { tool: 'get_customer', args: { customer_id: '67890' } },
    ]);
  });

  it('defaults the weather location to London', () => {
    expect(summary('How is the weather?')).toEqual([{ tool: 'get_weather', args: { location: 'London' } }]);
  });

  it('does not read instructions out of text to summarize', () => {
    expect(summary('Summarize: the weather in Paris is lovely today')).toEqual([
      { tool: 'summarize_text', args: { text: 'the weather in Paris is lovely today' } },
    ]);
  });

  it('finds nothing in an ambiguous query', () => {
    expect(detectIntents('Can you help me with something?')).toEqual([]);
  });
});

describe('arithmetic helpers', () => {
  it('normalizes operator words and extracts the expression', () => {
    const normalized = normalizeArithmetic('what is 7 times 6 plus 1');
    expect(extractExpression(normalized)).toBe('7 * 6 + 1');
  });

  it('returns an empty expression when there is no arithmetic', () => {
    expect(extractExpression('calculate something')).toBe('');
  });
});

describe('MockAgent', () => {
  it('records a reasoning step and a traced tool call per intent', async () => {
    const store = new MemoryTraceStore();
    const tracer = new Tracer(store);
    const handle = await tracer.startRun('Calculate 15 * 23 + 7');

    const answer = await new MockAgent().run('Calculate 15 * 23 + 7', handle);

    expect(answer).toBe('Result: 15 * 23 + 7 = 352');
    const steps = await store.getSteps(handle.runId);
    expect(steps.map(s => s.type)).toEqual(['reasoning', 'tool_call', 'tool_result']);
    expect(steps[0]).toMatchObject({ payload: { text: 'Using calculate: evaluate 15 * 23 + 7' } });
  });

  it('asks for clarification when no tool applies', async () => {
    const store = new MemoryTraceStore();
    const handle = await new Tracer(store).startRun('hello there');

    expect(await new MockAgent().run('hello there', handle)).toBe(CLARIFICATION);
    expect((await store.getSteps(handle.runId)).map(s => s.type)).toEqual(['reasoning']);
  });
});

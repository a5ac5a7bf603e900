import type Anthropic from '@anthropic-ai/sdk';
import { describe, expect, it } from 'vitest';

import { ClaudeAgent, type MessagesClient, type ModelResponse } from '../../agents/claude-agent.js';
import { MemoryTraceStore } from '../../observability/memory-store.js';
import { Tracer } from '../../observability/tracer.js';

class FakeMessagesClient implements MessagesClient {
  readonly requests: Anthropic.MessageCreateParamsNonStreaming[] = [];
  readonly messages = {
    create: async (params: Anthropic.MessageCreateParamsNonStreaming): Promise<ModelResponse> => {
      this.requests.push(structuredClone(params));
      const next = this.responses.shift();
      if (!next) {
        throw new Error('no scripted response left');
      }
      return next;
    },
  };

  constructor(private readonly responses: ModelResponse[]) {}
}

function toolUse(id: string, name: string, input: Record<string, unknown>): ModelResponse {
  return { content: [{ type: 'tool_use', id, name, input }], stop_reason: 'tool_use' };
}

async function setup(responses: ModelResponse[], maxIterations = 5) {
  const store = new MemoryTraceStore();
  const tracer = new Tracer(store);
  const client = new FakeMessagesClient(responses);
  const agent = new ClaudeAgent({ client, model: 'test-model', maxTokens: 256, maxIterations });
  const handle = await tracer.startRun('what is 6*7?');
  return { store, client, agent, handle };
}

describe('ClaudeAgent', () => {
  it('runs tool calls through the hook and returns the final text', async () => {
    const { store, client, agent, handle } = await setup([
      {
        content: [
          { type: 'text', text: 'Let me calculate that.' },
          { type: 'tool_use', id: 'tu_1', name: 'calculate', input: { expression: '6*7' } },
        ],
        stop_reason: 'tool_use',
      },
      { content: [{ type: 'text', text: 'The answer is 42.' }], stop_reason: 'end_turn' },
    ]);

    expect(await agent.run('what is 6*7?', handle)).toBe('The answer is 42.');

    const steps = await store.getSteps(handle.runId);
    expect(steps.map(s => s.type)).toEqual(['reasoning', 'tool_call', 'tool_result']);
    expect(steps[0]).toMatchObject({ payload: { text: 'Let me calculate that.' } });
    expect(steps[2]).toMatchObject({ payload: { tool: 'calculate', result: 'Result: 6*7 = 42' } });

    expect(client.requests).toHaveLength(2);
    expect(client.requests[0]).toMatchObject({ model: 'test-model', max_tokens: 256 });
    expect(client.requests[0].tools?.map(t => t.name)).toEqual([
      'get_weather',
      'get_customer',
      'summarize_text',
      'calculate',
    ]);
    expect(client.requests[1].messages).toEqual([
      { role: 'user', content: 'what is 6*7?' },
      {
        role: 'assistant',
        content: [
          { type: 'text', text: 'Let me calculate that.' },
          { type: 'tool_use', id: 'tu_1', name: 'calculate', input: { expression: '6*7' } },
        ],
      },
      {
        role: 'user',
        content: [{ type: 'tool_result', tool_use_id: 'tu_1', content: 'Result: 6*7 = 42' }],
      },
    ]);
  });

  it('lets a failing tool end the run with a traced error', async () => {
    const { store, agent, handle } = await setup([toolUse('tu_1', 'calculate', { expression: '1/0' })]);

    await expect(agent.run('what is 1/0?', handle)).rejects.toThrow('Division by zero error');
    expect(handle.lastError?.kind).toBe('division_by_zero');
    const steps = await store.getSteps(handle.runId);
    expect(steps.map(s => s.type)).toEqual(['tool_call', 'error']);
  });

  it('stops after the iteration limit', async () => {
    const { agent, handle, client } = await setup(
      [
        toolUse('tu_1', 'calculate', { expression: '1+1' }),
        toolUse('tu_2', 'calculate', { expression: '2+2' }),
      ],
      2
    );

    await expect(agent.run('loop', handle)).rejects.toThrow('Agent stopped after 2 iterations without a final answer');
    expect(client.requests).toHaveLength(2);
  });
});

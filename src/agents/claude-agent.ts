import Anthropic from '@anthropic-ai/sdk';
import type { TracingHook } from '../observability/tracer.js';
import { ToolRegistry } from './tools.js';
import type { AgentCapability } from './types.js';

const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
const DEFAULT_MAX_TOKENS = 1024;
const DEFAULT_MAX_ITERATIONS = 5;

const SYSTEM_PROMPT = `You are a helpful assistant with access to tools.

Use the tools to answer the user's question. Call a tool whenever the answer
depends on live data or arithmetic. When you have everything you need, reply
with the final answer as plain text.`;

/** The parts of a Messages API response the agent reads. */
export interface ModelContentBlock {
  type: string;
  text?: string;
  id?: string;
  name?: string;
  input?: unknown;
}

export interface ModelResponse {
  content: ModelContentBlock[];
  stop_reason: string | null;
}

export interface MessagesClient {
  messages: {
    create(params: Anthropic.MessageCreateParamsNonStreaming): PromiseLike<ModelResponse>;
  };
}

export interface ClaudeAgentOptions {
  client?: MessagesClient;
  tools?: ToolRegistry;
  model?: string;
  maxTokens?: number;
  maxIterations?: number;
}

interface ToolUse {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

/**
 * Tool-use loop over the Anthropic Messages API. Text blocks are recorded
 * as reasoning, tool calls go through the tracing hook, and a tool failure
 * ends the run.
 */
export class ClaudeAgent implements AgentCapability {
  readonly name = 'claude';
  private client: MessagesClient;
  private tools: ToolRegistry;
  private options: Required<Omit<ClaudeAgentOptions, 'client' | 'tools'>>;

  constructor(options: ClaudeAgentOptions = {}) {
    this.client = options.client ?? new Anthropic();
    this.tools = options.tools ?? new ToolRegistry();
    this.options = {
      model: options.model || DEFAULT_MODEL,
      maxTokens: options.maxTokens || DEFAULT_MAX_TOKENS,
      maxIterations: options.maxIterations || DEFAULT_MAX_ITERATIONS,
    };
  }

  async run(query: string, hook: TracingHook): Promise<string> {
    const messages: Anthropic.MessageParam[] = [{ role: 'user', content: query }];
    const tools: Anthropic.Tool[] = this.tools.list().map(tool => ({
      name: tool.name,
      description: tool.description,
      input_schema: tool.inputSchema,
    }));

    for (let iteration = 0; iteration < this.options.maxIterations; iteration++) {
      const response = await this.client.messages.create({
        model: this.options.model,
        max_tokens: this.options.maxTokens,
        system: SYSTEM_PROMPT,
        tools,
        messages,
      });

      const texts: string[] = [];
      const toolUses: ToolUse[] = [];
      for (const block of response.content) {
        if (block.type === 'text' && typeof block.text === 'string') {
          texts.push(block.text);
        } else if (block.type === 'tool_use') {
          toolUses.push(toToolUse(block));
        }
      }

      if (toolUses.length === 0) {
        return texts.join('\n').trim();
      }

      for (const text of texts) {
        if (text.trim()) {
          await hook.reasoning(text.trim());
        }
      }

      const results: Anthropic.ToolResultBlockParam[] = [];
      for (const use of toolUses) {
        const output = await hook.tool(use.name, use.input, () => this.tools.execute(use.name, use.input));
        results.push({ type: 'tool_result', tool_use_id: use.id, content: output });
      }

      messages.push({ role: 'assistant', content: toAssistantContent(texts, toolUses) });
      messages.push({ role: 'user', content: results });
    }

    throw new Error(
      `Agent stopped after ${this.options.maxIterations} iterations without a final answer`
    );
  }
}

function toToolUse(block: ModelContentBlock): ToolUse {
  if (typeof block.id !== 'string' || typeof block.name !== 'string') {
    throw new Error('Malformed tool_use block in model response');
  }
  const input =
    typeof block.input === 'object' && block.input !== null && !Array.isArray(block.input)
      ? { ...block.input }
      : {};
  return { id: block.id, name: block.name, input };
}

function toAssistantContent(texts: string[], toolUses: ToolUse[]): Anthropic.ContentBlockParam[] {
  return [
    ...texts
      .filter(text => text.trim())
      .map((text): Anthropic.TextBlockParam => ({ type: 'text', text })),
    ...toolUses.map((use): Anthropic.ToolUseBlockParam => ({
      type: 'tool_use',
      id: use.id,
      name: use.name,
      input: use.input,
    })),
  ];
}

import type { TracingHook } from '../observability/tracer.js';
import { ToolRegistry, type ToolName } from './tools.js';
import type { AgentCapability } from './types.js';

export const CLARIFICATION =
  "I understand your query, but I'm not sure which tool to use. Please be more specific.";

export interface ToolIntent {
  tool: ToolName;
  args: Record<string, unknown>;
  reason: string;
}

export interface MockAgentOptions {
  tools?: ToolRegistry;
}

const WORD_OPERATORS: Array<[RegExp, string]> = [
  [/\bdivided\s+by\b/gi, ' / '],
  [/\bmultiplied\s+by\b/gi, ' * '],
  [/\btimes\b/gi, ' * '],
  [/\bplus\b/gi, ' + '],
  [/\bminus\b/gi, ' - '],
  [/\bmodulo\b/gi, ' % '],
];

const ARITHMETIC = /\d\s*[-+*/%]\s*[-(\d]/;

/**
 * Keyword-routed agent. The same query always takes the same path, which
 * makes it the default for test suites and CI.
 */
export class MockAgent implements AgentCapability {
  readonly name = 'mock';
  private readonly tools: ToolRegistry;

  constructor(options: MockAgentOptions = {}) {
    this.tools = options.tools ?? new ToolRegistry();
  }

  async run(query: string, hook: TracingHook): Promise<string> {
    const intents = detectIntents(query);

    if (intents.length === 0) {
      await hook.reasoning('No tool matches the request; asking for clarification');
      return CLARIFICATION;
    }

    const answers: string[] = [];
    for (const intent of intents) {
      await hook.reasoning(`Using ${intent.tool}: ${intent.reason}`);
      const answer = await hook.tool(intent.tool, intent.args, () =>
        this.tools.execute(intent.tool, intent.args)
      );
      answers.push(answer);
    }
    return answers.join('\n');
  }
}

export function detectIntents(query: string): ToolIntent[] {
  // Text handed to the summarizer is payload, not instructions.
  const summarizeAt = query.search(/summari[sz]e/i);
  const instruction = summarizeAt >= 0 ? query.slice(0, summarizeAt) : query;
  const lower = instruction.toLowerCase();
  const intents: ToolIntent[] = [];

  if (lower.includes('weather')) {
    const location = extractLocation(instruction) ?? 'London';
    intents.push({ tool: 'get_weather', args: { location }, reason: `weather lookup for ${location}` });
  }

  if (lower.includes('customer')) {
    const match = /customer\s+#?([A-Za-z0-9_-]+)/i.exec(instruction);
    const customerId = match ? match[1] : '';
    intents.push({ tool: 'get_customer', args: { customer_id: customerId }, reason: `customer lookup for ${customerId || '(no id)'}` });
  }

  const arithmetic = normalizeArithmetic(instruction);
  if (/calculat|compute/.test(lower) || ARITHMETIC.test(arithmetic)) {
    const expression = extractExpression(arithmetic);
    intents.push({ tool: 'calculate', args: { expression }, reason: `evaluate ${expression || '(no expression)'}` });
  }

  if (summarizeAt >= 0) {
    const text = query.slice(summarizeAt).replace(/^summari[sz]e\s*:?\s*/i, '');
    intents.push({ tool: 'summarize_text', args: { text }, reason: 'summarize the provided text' });
  }

  return intents;
}

export function normalizeArithmetic(text: string): string {
  return WORD_OPERATORS.reduce((acc, [pattern, symbol]) => acc.replace(pattern, symbol), text);
}

export function extractExpression(text: string): string {
  const candidates = text.match(/[-(]?\d[\d\s+\-*/%().]*/g) ?? [];
  const withOperator = candidates.find(c => ARITHMETIC.test(c));
  const chosen = withOperator ?? '';
  return chosen.replace(/[\s+\-*/%(.]+$/, '').replace(/\s+/g, ' ').trim();
}

function extractLocation(text: string): string | null {
  const match = /\bin\s+([A-Za-z][A-Za-z .'-]*?)(?=\s+and\b|[?!,;]|\.(?:\s|$)|$)/i.exec(text);
  return match ? match[1].trim() : null;
}

import { ClaudeAgent } from './claude-agent.js';
import { MockAgent } from './mock-agent.js';
import { ToolRegistry } from './tools.js';
import type { AgentCapability, AgentOptions } from './types.js';

export * from './types.js';
export { MockAgent, CLARIFICATION, detectIntents, normalizeArithmetic, extractExpression } from './mock-agent.js';
export type { ToolIntent, MockAgentOptions } from './mock-agent.js';
export { ClaudeAgent } from './claude-agent.js';
export type { ClaudeAgentOptions, MessagesClient, ModelResponse, ModelContentBlock } from './claude-agent.js';
export { ToolRegistry, BUILTIN_TOOLS, formatNumber } from './tools.js';
export type { ToolDefinition, ToolName, ToolInputSchema, ToolRegistryOptions } from './tools.js';
export { evaluateExpression } from './calculator.js';
export { executeTraced, toolsUsed } from './execute.js';
export type { TracedExecution, ExecuteOptions } from './execute.js';

export function createAgent(options: AgentOptions): AgentCapability {
  const tools = new ToolRegistry({ faults: options.faults });
  switch (options.kind) {
    case 'mock':
      return new MockAgent({ tools });
    case 'claude':
      return new ClaudeAgent({
        tools,
        model: options.model,
        maxTokens: options.maxTokens,
        maxIterations: options.maxIterations,
      });
  }
}

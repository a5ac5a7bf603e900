import { createHash } from 'crypto';
import { ClassifiedError } from '../classifier/types.js';
import { evaluateExpression } from './calculator.js';

export type ToolName = 'get_weather' | 'get_customer' | 'summarize_text' | 'calculate';

// A type alias rather than an interface so it satisfies index-signature
// shaped schema types such as the Messages API tool schema.
export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, { type: string; description: string }>;
  required: string[];
};

export interface ToolDefinition {
  name: ToolName;
  description: string;
  inputSchema: ToolInputSchema;
  execute(args: Record<string, unknown>): string;
}

interface Customer {
  name: string;
  email: string;
  status: 'active' | 'inactive' | 'premium' | 'suspended';
  totalOrders: number;
  lastOrder: string | null;
}

const CUSTOMERS: Readonly<Record<string, Customer>> = {
  '12345': { name: 'Jane Smith', email: 'jane.smith@example.com', status: 'premium', totalOrders: 42, lastOrder: '2024-05-14' },
  '67890': { name: 'Bob Johnson', email: 'bob.johnson@example.com', status: 'active', totalOrders: 7, lastOrder: '2024-03-02' },
  '24680': { name: 'Alice Brown', email: 'alice.brown@example.com', status: 'inactive', totalOrders: 0, lastOrder: null },
  '13579': { name: 'John Doe', email: 'john.doe@example.com', status: 'suspended', totalOrders: 3, lastOrder: '2023-11-20' },
};

const CONDITIONS = ['sunny', 'cloudy', 'rainy', 'stormy', 'foggy', 'snowy'];

export const MIN_SUMMARY_INPUT = 10;

export const getWeather: ToolDefinition = {
  name: 'get_weather',
  description: 'Get current weather information for a location',
  inputSchema: {
    type: 'object',
    properties: {
      location: { type: 'string', description: 'The location to get weather for' },
      units: { type: 'string', description: 'celsius or fahrenheit' },
    },
    required: ['location'],
  },
  execute(args) {
    const location = stringArg(args, 'location').trim();
    if (location.length === 0) {
      throw new ClassifiedError('Invalid location: must be a non-empty string', 'validation_error');
    }
    const units = optionalStringArg(args, 'units') ?? 'celsius';
    if (units !== 'celsius' && units !== 'fahrenheit') {
      throw new ClassifiedError(`Invalid units: ${units}`, 'validation_error');
    }

    // Readings are a pure function of the location so runs replay identically.
    const digest = createHash('sha256').update(location.toLowerCase()).digest();
    const celsius = Math.round(((digest[0] / 255) * 45 - 10) * 10) / 10;
    const temperature = units === 'celsius' ? celsius : Math.round((celsius * 9 / 5 + 32) * 10) / 10;
    const conditions = CONDITIONS[digest[1] % CONDITIONS.length];
    const humidity = 30 + (digest[2] % 61);

    return `Weather in ${location}: ${temperature}°${units === 'celsius' ? 'C' : 'F'}, ${conditions}, Humidity: ${humidity}%`;
  },
};

export const getCustomer: ToolDefinition = {
  name: 'get_customer',
  description: 'Get customer information by ID',
  inputSchema: {
    type: 'object',
    properties: {
      customer_id: { type: 'string', description: 'The customer ID to look up' },
    },
    required: ['customer_id'],
  },
  execute(args) {
    const customerId = stringArg(args, 'customer_id').trim();
    const customer = Object.hasOwn(CUSTOMERS, customerId) ? CUSTOMERS[customerId] : undefined;
    if (!customer) {
      throw new ClassifiedError(`Customer ${customerId} not found`, 'not_found');
    }

    const lines = [
      `Customer ${customer.name} (ID: ${customerId})`,
      `Email: ${customer.email}`,
      `Status: ${customer.status}`,
      `Total Orders: ${customer.totalOrders}`,
    ];
    if (customer.lastOrder) {
      lines.push(`Last Order: ${customer.lastOrder}`);
    }
    return lines.join('\n');
  },
};

export const summarizeText: ToolDefinition = {
  name: 'summarize_text',
  description: 'Summarize a given text to a specified number of words',
  inputSchema: {
    type: 'object',
    properties: {
      text: { type: 'string', description: 'The text to summarize' },
      max_words: { type: 'number', description: 'Maximum length of the summary in words' },
    },
    required: ['text'],
  },
  execute(args) {
    const text = stringArg(args, 'text').trim();
    const maxWords = optionalNumberArg(args, 'max_words') ?? 20;

    if (text.length < MIN_SUMMARY_INPUT) {
      throw new ClassifiedError('Text too short to summarize', 'validation_error');
    }
    if (!Number.isInteger(maxWords) || maxWords < 1) {
      throw new ClassifiedError('Maximum length must be at least 1 word', 'validation_error');
    }

    const words = text.split(/\s+/);
    if (words.length <= maxWords) {
      return text;
    }
    return `Summary (${maxWords} words): ${words.slice(0, maxWords).join(' ')}...`;
  },
};

export const calculate: ToolDefinition = {
  name: 'calculate',
  description: 'Evaluate an arithmetic expression using + - * / % and parentheses',
  inputSchema: {
    type: 'object',
    properties: {
      expression: { type: 'string', description: 'Mathematical expression to evaluate' },
    },
    required: ['expression'],
  },
  execute(args) {
    const expression = stringArg(args, 'expression').trim();
    return `Result: ${expression} = ${formatNumber(evaluateExpression(expression))}`;
  },
};

export const BUILTIN_TOOLS: readonly ToolDefinition[] = [getWeather, getCustomer, summarizeText, calculate];

export interface ToolRegistryOptions {
  tools?: readonly ToolDefinition[];
  /** Tool name to error message; the tool raises it instead of running. */
  faults?: Record<string, string>;
}

export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();
  private faults: Record<string, string>;

  constructor(options: ToolRegistryOptions = {}) {
    for (const tool of options.tools ?? BUILTIN_TOOLS) {
      this.tools.set(tool.name, tool);
    }
    this.faults = options.faults ?? {};
  }

  list(): ToolDefinition[] {
    return [...this.tools.values()];
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  execute(name: string, args: Record<string, unknown>): string {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ClassifiedError(`Tool not found: ${name}`, 'not_found');
    }
    const fault = Object.hasOwn(this.faults, name) ? this.faults[name] : undefined;
    if (fault !== undefined) {
      throw new Error(fault);
    }
    return tool.execute(args);
  }
}

export function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : String(Number(value.toFixed(6)));
}

function stringArg(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  if (typeof value !== 'string') {
    throw new ClassifiedError(`Invalid argument ${key}: expected a string`, 'validation_error');
  }
  return value;
}

function optionalStringArg(args: Record<string, unknown>, key: string): string | undefined {
  return args[key] === undefined ? undefined : stringArg(args, key);
}

function optionalNumberArg(args: Record<string, unknown>, key: string): number | undefined {
  const value = args[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') {
    throw new ClassifiedError(`Invalid argument ${key}: expected a number`, 'validation_error');
  }
  return value;
}

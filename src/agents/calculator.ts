import { ClassifiedError } from '../classifier/types.js';

type Token =
  | { type: 'number'; value: number }
  | { type: 'op'; value: '+' | '-' | '*' | '/' | '%' }
  | { type: 'paren'; value: '(' | ')' };

/**
 * Evaluates arithmetic over + - * / % and parentheses with the usual
 * precedence. Never touches `eval`.
 */
export function evaluateExpression(expression: string): number {
  const tokens = tokenize(expression);
  if (tokens.length === 0) {
    throw invalid(expression);
  }

  let pos = 0;

  const peek = (): Token | undefined => tokens[pos];

  const parseExpression = (): number => {
    let value = parseTerm();
    for (let token = peek(); token?.type === 'op' && (token.value === '+' || token.value === '-'); token = peek()) {
      pos++;
      const rhs = parseTerm();
      value = token.value === '+' ? value + rhs : value - rhs;
    }
    return value;
  };

  const parseTerm = (): number => {
    let value = parseFactor();
    for (
      let token = peek();
      token?.type === 'op' && (token.value === '*' || token.value === '/' || token.value === '%');
      token = peek()
    ) {
      pos++;
      const rhs = parseFactor();
      if ((token.value === '/' || token.value === '%') && rhs === 0) {
        throw new ClassifiedError('Division by zero error', 'division_by_zero');
      }
      value = token.value === '*' ? value * rhs : token.value === '/' ? value / rhs : value % rhs;
    }
    return value;
  };

  const parseFactor = (): number => {
    const token = peek();
    if (!token) {
      throw invalid(expression);
    }
    if (token.type === 'op' && (token.value === '-' || token.value === '+')) {
      pos++;
      const operand = parseFactor();
      return token.value === '-' ? -operand : operand;
    }
    if (token.type === 'number') {
      pos++;
      return token.value;
    }
    if (token.type === 'paren' && token.value === '(') {
      pos++;
      const value = parseExpression();
      const closing = peek();
      if (closing?.type !== 'paren' || closing.value !== ')') {
        throw invalid(expression);
      }
      pos++;
      return value;
    }
    throw invalid(expression);
  };

  const result = parseExpression();
  if (pos !== tokens.length) {
    throw invalid(expression);
  }
  return result;
}

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < expression.length) {
    const ch = expression[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (/[0-9.]/.test(ch)) {
      let j = i;
      while (j < expression.length && /[0-9.]/.test(expression[j])) j++;
      const literal = expression.slice(i, j);
      const value = Number(literal);
      if (!Number.isFinite(value)) {
        throw invalid(expression);
      }
      tokens.push({ type: 'number', value });
      i = j;
      continue;
    }
    if (ch === '+' || ch === '-' || ch === '*' || ch === '/' || ch === '%') {
      tokens.push({ type: 'op', value: ch });
      i++;
      continue;
    }
    if (ch === '(' || ch === ')') {
      tokens.push({ type: 'paren', value: ch });
      i++;
      continue;
    }
    throw invalid(expression);
  }

  return tokens;
}

function invalid(expression: string): ClassifiedError {
  return new ClassifiedError(`Invalid mathematical expression: ${expression}`, 'validation_error');
}

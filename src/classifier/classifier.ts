import { DEFAULT_RULES, ERROR_NAMES, SYSTEM_ERROR_CODES, httpStatusKind } from './rules.js';
import { isRecord } from '../utils/guards.js';
import { isErrorKind, type ClassificationRule, type Classifier, type ErrorKind } from './types.js';

export function createClassifier(rules: readonly ClassificationRule[] = DEFAULT_RULES): Classifier {
  const table = rules.map(rule => ({
    kind: rule.kind,
    match: rule.match.map(m => m.toLowerCase()).filter(m => m.length > 0),
  }));

  return (raw: unknown): ErrorKind => {
    try {
      const structured = classifyStructured(raw);
      if (structured) {
        return structured;
      }

      const message = errorMessage(raw).toLowerCase();
      if (message.length === 0) {
        return 'unknown';
      }

      for (const rule of table) {
        if (rule.match.some(phrase => message.includes(phrase))) {
          return rule.kind;
        }
      }
      return 'unknown';
    } catch {
      // Hostile inputs (throwing getters, broken toString) still get a kind.
      return 'unknown';
    }
  };
}

export const classifyError: Classifier = createClassifier();

/**
 * Best-effort message extraction for anything that can be thrown.
 */
export function errorMessage(raw: unknown): string {
  if (raw === null || raw === undefined) {
    return '';
  }
  if (typeof raw === 'string') {
    return raw;
  }
  if (raw instanceof Error) {
    return raw.message;
  }
  const message = property(raw, 'message');
  if (typeof message === 'string') {
    return message;
  }
  try {
    return String(raw);
  } catch {
    return '';
  }
}

function classifyStructured(raw: unknown): ErrorKind | null {
  if (typeof raw !== 'object' || raw === null) {
    return null;
  }

  const kind = property(raw, 'kind');
  if (isErrorKind(kind)) {
    return kind;
  }

  const status = property(raw, 'status') ?? property(raw, 'statusCode');
  if (typeof status === 'number') {
    const byStatus = httpStatusKind(status);
    if (byStatus) return byStatus;
  }

  const code = property(raw, 'code');
  if (typeof code === 'string' && Object.hasOwn(SYSTEM_ERROR_CODES, code)) {
    return SYSTEM_ERROR_CODES[code];
  }

  const name = property(raw, 'name');
  if (typeof name === 'string' && Object.hasOwn(ERROR_NAMES, name)) {
    return ERROR_NAMES[name];
  }

  return null;
}

function property(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

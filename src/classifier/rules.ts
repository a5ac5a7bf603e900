import type { ClassificationRule, ErrorKind } from './types.js';

// Order is priority: the first rule with a matching phrase wins.
export const DEFAULT_RULES: readonly ClassificationRule[] = [
  {
    kind: 'division_by_zero',
    match: ['division by zero', 'divide by zero', 'divided by zero', 'division-by-zero'],
    description: 'Checked before anything arithmetic or generic',
  },
  {
    kind: 'rate_limit',
    match: ['rate limit', 'rate-limit', 'too many requests', 'quota exceeded'],
  },
  {
    kind: 'timeout',
    match: ['timed out', 'timeout', 'time out', 'deadline exceeded'],
    description: 'Connection and socket timeouts land here before api_error',
  },
  {
    kind: 'not_found',
    match: ['not found', 'no such', 'does not exist'],
  },
  {
    kind: 'validation_error',
    match: ['validation', 'invalid', 'too short', 'too long', 'malformed', 'must be', 'is required'],
  },
  {
    kind: 'api_error',
    match: [
      'api error',
      'api request',
      'server error',
      'service unavailable',
      'bad gateway',
      'connection refused',
      'connection reset',
      'connection error',
      'connection failed',
      'request failed',
      'bad request',
      'status code',
      'api',
      'request',
    ],
    description: 'Catch-all for API and request failures; stays last',
  },
];

export function httpStatusKind(status: number): ErrorKind | null {
  if (status === 429) return 'rate_limit';
  if (status === 404) return 'not_found';
  if (status === 408 || status === 504) return 'timeout';
  if (status === 400 || status === 422) return 'validation_error';
  if (status >= 400 && status < 600) return 'api_error';
  return null;
}

export const SYSTEM_ERROR_CODES: Readonly<Record<string, ErrorKind>> = {
  ETIMEDOUT: 'timeout',
  ESOCKETTIMEDOUT: 'timeout',
  ECONNABORTED: 'timeout',
  ECONNREFUSED: 'api_error',
  ECONNRESET: 'api_error',
  ENOTFOUND: 'api_error',
  EAI_AGAIN: 'api_error',
  EPIPE: 'api_error',
};

export const ERROR_NAMES: Readonly<Record<string, ErrorKind>> = {
  TimeoutError: 'timeout',
  APIConnectionTimeoutError: 'timeout',
  APIConnectionError: 'api_error',
};

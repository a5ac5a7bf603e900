export const ERROR_KINDS = [
  'timeout',
  'api_error',
  'validation_error',
  'not_found',
  'division_by_zero',
  'rate_limit',
  'unknown',
] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export function isErrorKind(value: unknown): value is ErrorKind {
  return ERROR_KINDS.some(kind => kind === value);
}

/**
 * One row of the text rule table. `match` entries are compared as
 * case-insensitive substrings of the error message.
 */
export interface ClassificationRule {
  kind: ErrorKind;
  match: string[];
  description?: string;
}

export type Classifier = (raw: unknown) => ErrorKind;

/** An error that already knows its kind; classification short-circuits on it. */
export class ClassifiedError extends Error {
  constructor(message: string, public readonly kind: ErrorKind) {
    super(message);
    this.name = 'ClassifiedError';
  }
}

export function emptyErrorKindCounts(): Record<ErrorKind, number> {
  return {
    timeout: 0,
    api_error: 0,
    validation_error: 0,
    not_found: 0,
    division_by_zero: 0,
    rate_limit: 0,
    unknown: 0,
  };
}

export class StepwiseError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'StepwiseError';
  }
}

/** The backing medium of a trace store is unavailable, closed or corrupt. */
export class StorageError extends StepwiseError {
  constructor(message: string, public readonly originalError?: unknown) {
    super(message, 'STORAGE_ERROR');
    this.name = 'StorageError';
  }
}

export class UnknownRunError extends StepwiseError {
  constructor(public readonly runId: string, message: string = `Unknown run: ${runId}`) {
    super(message, 'UNKNOWN_RUN');
    this.name = 'UnknownRunError';
  }
}

export class InvalidRunStateError extends StepwiseError {
  constructor(public readonly runId: string, message: string) {
    super(message, 'INVALID_RUN_STATE');
    this.name = 'InvalidRunStateError';
  }
}

export class DuplicateTestCaseError extends StepwiseError {
  constructor(public readonly testCaseId: string) {
    super(`Test case already registered: ${testCaseId}`, 'DUPLICATE_TEST_CASE');
    this.name = 'DuplicateTestCaseError';
  }
}

export class ConfigError extends StepwiseError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class TestCaseFormatError extends StepwiseError {
  constructor(message: string, public readonly source?: string) {
    super(source ? `${source}: ${message}` : message, 'TEST_CASE_FORMAT');
    this.name = 'TestCaseFormatError';
  }
}

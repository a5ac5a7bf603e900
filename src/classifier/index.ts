export * from './types.js';
export { classifyError, createClassifier, errorMessage } from './classifier.js';
export { DEFAULT_RULES, httpStatusKind } from './rules.js';

export * from './errors.js';
export * from './classifier/index.js';
export * from './observability/index.js';
export * from './agents/index.js';
export * from './harness/index.js';
export * from './config/index.js';

export * from './types.js';
export { loadConfig, parseConfig, applyEnvOverrides, buildClassifier } from './loader.js';
export type { LoadConfigOptions } from './loader.js';

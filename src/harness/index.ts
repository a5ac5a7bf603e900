export * from './types.js';
export { TestHarness, UNCAUGHT_REASON } from './harness.js';
export { gradeRun, matchesExpectedError, missingTools } from './grader.js';
export type { Grade } from './grader.js';
export {
  loadTestCases,
  loadTestCaseFiles,
  loadDefaultTestCases,
  parseTestCases,
  DEFAULT_CASES_PATH,
} from './test-case-loader.js';
export { exportResults, buildReport } from './results-exporter.js';
export type { ExportOptions, HarnessReport } from './results-exporter.js';

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { TestHarness } from './harness.js';
import type { HarnessSummary, TestCase, TestResult } from './types.js';

export interface ExportOptions {
  outputDir: string;
  reportId?: string;
}

export interface HarnessReport {
  id: string;
  createdAt: string;
  agent: string;
  summary: HarnessSummary;
  testCases: TestCase[];
  results: TestResult[];
}

export function buildReport(harness: TestHarness, agent: string, id: string): HarnessReport {
  return {
    id,
    createdAt: new Date().toISOString(),
    agent,
    summary: harness.getSummary(),
    testCases: harness.getTestCases(),
    results: harness.getResults(),
  };
}

/**
 * Writes the harness report to `<outputDir>/<id>.json` and `latest.json`.
 * Returns the path of the first.
 */
export async function exportResults(
  harness: TestHarness,
  agent: string,
  options: ExportOptions
): Promise<string> {
  const { outputDir, reportId = `report-${Date.now()}` } = options;
  const report = buildReport(harness, agent, reportId);
  const body = JSON.stringify(report, null, 2);

  await mkdir(outputDir, { recursive: true });
  const outputPath = join(outputDir, `${reportId}.json`);
  await writeFile(outputPath, body);
  await writeFile(join(outputDir, 'latest.json'), body);

  return outputPath;
}

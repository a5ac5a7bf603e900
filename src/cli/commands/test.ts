import { Command } from 'commander';
import type { AgentKind } from '../../agents/types.js';
import {
  FAILURE_CATEGORIES,
  TestHarness,
  exportResults,
  loadDefaultTestCases,
  loadTestCaseFiles,
  type HarnessEvent,
  type HarnessSummary,
  type TestResult,
} from '../../harness/index.js';
import { formatPercent } from '../../observability/index.js';
import { failCommand, parseAgentKind, withContext } from '../context.js';
import { icons, keyValue, nextSteps, resultBox, section, style } from '../theme.js';

interface TestOptions {
  cases?: string[];
  agent?: AgentKind;
  save?: boolean;
  replayFailed?: boolean;
  json?: boolean;
}

export const testCommand = new Command('test')
  .description('Run test cases through traced agent runs and grade them')
  .option('-c, --cases <patterns...>', 'Test case files or globs (defaults to the bundled suite)')
  .option('-a, --agent <kind>', 'Agent to use (mock, claude)', parseAgentKind)
  .option('--save', 'Write the report to the results directory')
  .option('--replay-failed', 'Run failed cases once more after the batch')
  .option('--json', 'Output the summary and results as JSON')
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('stepwise test')}                           ${style.dim('Run the bundled suite')}
  ${style.command('stepwise test -c "cases/**/*.yaml"')}      ${style.dim('Run your own cases')}
  ${style.command('stepwise test --save --replay-failed')}    ${style.dim('Save a report, retry failures')}
`)
  .action(async (options: TestOptions, command: Command) => {
    try {
      await withContext(command, { agent: options.agent }, async ctx => {
        const testCases = options.cases?.length
          ? await loadTestCaseFiles(options.cases)
          : await loadDefaultTestCases();

        const harness = new TestHarness(ctx.tracer, ctx.agent, {
          onEvent: options.json ? undefined : printEvent,
        });
        harness.addTestCases(testCases);

        if (!options.json) {
          console.log(`\n${icons.test} ${style.bold('Running')} ${style.number(String(testCases.length))} test case(s) with the ${style.info(ctx.agent.name)} agent\n`);
        }

        const startTime = Date.now();
        const results = await harness.runAllTests();

        let replayed: TestResult[] = [];
        if (options.replayFailed && results.some(r => !r.passed)) {
          if (!options.json) console.log(section('Replaying failures'));
          replayed = await harness.replayFailed();
        }

        const summary = harness.getSummary();

        let reportPath: string | undefined;
        if (options.save) {
          reportPath = await exportResults(harness, ctx.agent.name, { outputDir: ctx.config.harness.resultsDir });
        }

        if (options.json) {
          console.log(JSON.stringify({ summary, results: harness.getResults() }, null, 2));
        } else {
          printSummary(summary, Date.now() - startTime, replayed);
          if (reportPath) {
            console.log(keyValue('Report', style.path(reportPath), 1));
          }
          if (summary.failed > 0) {
            console.log(nextSteps([
              { command: 'stepwise history -s failed', description: 'List failed runs' },
              { command: 'stepwise trace <run-id> -v', description: 'Inspect a failed run step by step' },
            ]));
          }
        }

        if (summary.failed > 0) {
          process.exitCode = 1;
        }
      });
    } catch (error) {
      failCommand(error);
    }
  });

function printEvent(event: HarnessEvent): void {
  if (event.type !== 'case:finish') return;

  const { testCase, result } = event;
  const icon = result.passed ? style.success(icons.success) : style.error(icons.error);
  const took = style.muted(`(${result.durationMs}ms)`);
  console.log(`  ${icon} ${testCase.name} ${style.muted(testCase.id)} ${took}`);
  for (const reason of result.failureReasons) {
    console.log(`      ${style.dim(icons.arrowRight)} ${style.error(reason)}`);
  }
  if (!result.passed && result.runId) {
    console.log(`      ${style.dim(`run ${result.runId}`)}`);
  }
}

function printSummary(summary: HarnessSummary, durationMs: number, replayed: TestResult[]): void {
  console.log('');
  console.log(resultBox({ passed: summary.passed, failed: summary.failed, duration: durationMs }));
  console.log(keyValue('Pass rate', style.number(formatPercent(summary.passRate)), 1));

  const categories = FAILURE_CATEGORIES.filter(category => summary.failuresByCategory[category] > 0);
  if (categories.length > 0) {
    console.log(section('Failures by category'));
    for (const category of categories) {
      console.log(`   ${style.error(icons.bullet)} ${category.padEnd(20)} ${style.number(String(summary.failuresByCategory[category]))}`);
    }
  }

  if (replayed.length > 0) {
    const recovered = replayed.filter(r => r.passed).length;
    console.log(keyValue('Replayed', `${replayed.length} case(s), ${recovered} passed on retry`, 1));
  }
  console.log('');
}

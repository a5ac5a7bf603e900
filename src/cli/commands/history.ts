import { Command, InvalidArgumentError } from 'commander';
import { formatRunList, type RunStatus } from '../../observability/index.js';
import { failCommand, parseCount, parseDate, withContext } from '../context.js';
import { icons, nextSteps, style } from '../theme.js';

interface HistoryOptions {
  status?: RunStatus;
  since?: Date;
  until?: Date;
  limit: number;
  json?: boolean;
}

function parseStatus(value: string): RunStatus {
  if (value !== 'running' && value !== 'success' && value !== 'failed') {
    throw new InvalidArgumentError('Expected running, success or failed.');
  }
  return value;
}

export const historyCommand = new Command('history')
  .description('List recorded runs, newest first')
  .option('-s, --status <status>', 'Only runs with this status (running, success, failed)', parseStatus)
  .option('--since <date>', 'Only runs started at or after this time', parseDate)
  .option('--until <date>', 'Only runs started at or before this time', parseDate)
  .option('-n, --limit <count>', 'Maximum number of runs to list', parseCount, 20)
  .option('--json', 'Output as JSON')
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('stepwise history')}                      ${style.dim('Latest 20 runs')}
  ${style.command('stepwise history -s failed -n 50')}      ${style.dim('Latest 50 failed runs')}
  ${style.command('stepwise history --since 2024-06-01')}   ${style.dim('Runs since a date')}
`)
  .action(async (options: HistoryOptions, command: Command) => {
    try {
      await withContext(command, {}, async ({ store }) => {
        const runs = await store.listRuns({
          status: options.status,
          range: { from: options.since, to: options.until },
          limit: options.limit,
        });

        if (options.json) {
          console.log(JSON.stringify(runs, null, 2));
          return;
        }

        if (runs.length === 0) {
          console.log(`\n${style.warning(`${icons.warning} No runs found.`)}`);
          console.log(nextSteps([
            { command: 'stepwise run "<query>"', description: 'Record a single run' },
            { command: 'stepwise test', description: 'Run the default test suite' },
          ]));
          return;
        }

        console.log(formatRunList(runs));
      });
    } catch (error) {
      failCommand(error);
    }
  });

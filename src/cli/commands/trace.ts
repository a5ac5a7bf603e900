import { Command } from 'commander';
import { UnknownRunError } from '../../errors.js';
import { formatRun } from '../../observability/index.js';
import { failCommand, withContext } from '../context.js';
import { icons, nextSteps, style } from '../theme.js';

interface TraceOptions {
  json?: boolean;
  verbose?: boolean;
  color: boolean;
}

export const traceCommand = new Command('trace')
  .description('Show the recorded steps of a run')
  .argument('[run-id]', 'Run id or unique id prefix (defaults to the latest run)')
  .option('--json', 'Output the run and its steps as JSON')
  .option('-v, --verbose', 'Show tool arguments and results')
  .option('--no-color', 'Disable colors')
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('stepwise trace')}            ${style.dim('Show the most recent run')}
  ${style.command('stepwise trace 3f2a9c1e')}   ${style.dim('Show a run by id prefix')}
  ${style.command('stepwise trace -v --json')}  ${style.dim('Full JSON of the latest run')}
`)
  .action(async (runId: string | undefined, options: TraceOptions, command: Command) => {
    try {
      await withContext(command, {}, async ({ store }) => {
        const run = runId ? await store.findRun(runId) : (await store.listRuns({ limit: 1 }))[0];

        if (!run) {
          if (runId) {
            throw new UnknownRunError(runId);
          }
          console.log(`\n${style.warning(`${icons.warning} No runs recorded yet.`)}`);
          console.log(nextSteps([
            { command: 'stepwise run "<query>"', description: 'Record a single run' },
            { command: 'stepwise test', description: 'Run the default test suite' },
          ]));
          return;
        }

        const steps = await store.getSteps(run.id);
        console.log(formatRun(run, steps, {
          json: options.json,
          verbose: options.verbose,
          color: options.color,
        }));
      });
    } catch (error) {
      failCommand(error);
    }
  });

import { Command } from 'commander';
import { executeTraced } from '../../agents/execute.js';
import type { AgentKind } from '../../agents/types.js';
import { formatRun } from '../../observability/index.js';
import { failCommand, parseAgentKind, withContext } from '../context.js';
import { Spinner, icons, keyValue, style } from '../theme.js';

interface RunOptions {
  agent?: AgentKind;
  json?: boolean;
  verbose?: boolean;
}

export const runCommand = new Command('run')
  .description('Run one query through the agent and record its trace')
  .argument('<query...>', 'Query to send to the agent')
  .option('-a, --agent <kind>', 'Agent to use (mock, claude)', parseAgentKind)
  .option('--json', 'Output the run and its steps as JSON')
  .option('-v, --verbose', 'Show tool arguments and results')
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('stepwise run "What is 15 * 23?"')}          ${style.dim('Run a query with the mock agent')}
  ${style.command('stepwise run -a claude "weather in Oslo"')}  ${style.dim('Use the Claude agent')}
  ${style.command('stepwise run --json "customer 12345"')}      ${style.dim('Raw JSON output')}
`)
  .action(async (words: string[], options: RunOptions, command: Command) => {
    try {
      await withContext(command, { agent: options.agent }, async ctx => {
        const query = words.join(' ');
        const spinner = new Spinner(`Running ${style.info(ctx.agent.name)} agent...`);
        if (!options.json) spinner.start();

        const execution = await executeTraced(ctx.tracer, ctx.agent, query, {
          metadata: { source: 'cli' },
        });
        spinner.stop();

        if (options.json) {
          console.log(formatRun(execution.run, execution.steps, { json: true }));
        } else {
          console.log(formatRun(execution.run, execution.steps, { verbose: options.verbose }));
          if (execution.uncaught) {
            console.log(keyValue('Note', style.warning(`${icons.warning} the agent raised an error it did not record`), 1));
          }
        }

        if (execution.run.status === 'failed') {
          process.exitCode = 1;
        }
      });
    } catch (error) {
      failCommand(error);
    }
  });

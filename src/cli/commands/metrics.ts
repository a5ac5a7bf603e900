import { Command } from 'commander';
import { formatMetrics } from '../../observability/index.js';
import { failCommand, parseDate, withContext } from '../context.js';
import { style } from '../theme.js';

interface MetricsOptions {
  since?: Date;
  until?: Date;
  json?: boolean;
}

export const metricsCommand = new Command('metrics')
  .description('Aggregate run outcomes and error kinds')
  .option('--since <date>', 'Only runs started at or after this time', parseDate)
  .option('--until <date>', 'Only runs started at or before this time', parseDate)
  .option('--json', 'Output as JSON')
  .addHelpText('after', `
${style.bold('Examples:')}
  ${style.command('stepwise metrics')}                      ${style.dim('Metrics over every run')}
  ${style.command('stepwise metrics --since 2024-06-01')}   ${style.dim('Metrics over a time window')}
`)
  .action(async (options: MetricsOptions, command: Command) => {
    try {
      await withContext(command, {}, async ({ tracer }) => {
        const metrics = await tracer.getMetrics({ from: options.since, to: options.until });
        console.log(options.json ? JSON.stringify(metrics, null, 2) : formatMetrics(metrics));
      });
    } catch (error) {
      failCommand(error);
    }
  });

#!/usr/bin/env node

import { Command } from 'commander';
import { runCommand } from './commands/run.js';
import { testCommand } from './commands/test.js';
import { historyCommand } from './commands/history.js';
import { traceCommand } from './commands/trace.js';
import { replayCommand } from './commands/replay.js';
import { metricsCommand } from './commands/metrics.js';
import { pruneCommand } from './commands/prune.js';
import { BANNER_MINIMAL, style } from './theme.js';

const program = new Command();

program
  .name('stepwise')
  .description(`${BANNER_MINIMAL}\n\nRecord, classify and grade the steps of tool-using agents.`)
  .version('0.1.0')
  .option('--config <path>', 'Path to a stepwise config file (default: ./stepwise.config.yaml)')
  .configureHelp({
    sortSubcommands: true,
    subcommandTerm: (cmd) => style.command(cmd.name()) + ' ' + style.dim(cmd.usage()),
  })
  .addHelpText('afterAll', `
${style.bold('Examples:')}

  ${style.dim('# Record one traced run')}
  $ stepwise run "What is 100 divided by 0?"

  ${style.dim('# Run the bundled test suite and save a report')}
  $ stepwise test --save

  ${style.dim('# Inspect what happened')}
  $ stepwise history -s failed && stepwise trace <run-id> -v

${style.muted('For more info, run any command with --help')}
`);

// Execution
program.addCommand(runCommand);
program.addCommand(testCommand);
program.addCommand(replayCommand);

// Inspection
program.addCommand(historyCommand);
program.addCommand(traceCommand);
program.addCommand(metricsCommand);

// Maintenance
program.addCommand(pruneCommand);

await program.parseAsync(process.argv);

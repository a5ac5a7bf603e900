import { Command } from 'commander';
import { executeTraced } from '../../agents/execute.js';
import type { AgentKind } from '../../agents/types.js';
import { UnknownRunError } from '../../errors.js';
import { formatRun } from '../../observability/index.js';
import { failCommand, parseAgentKind, withContext } from '../context.js';
import { icons, keyValue, style } from '../theme.js';

interface ReplayOptions {
  agent?: AgentKind;
  json?: boolean;
  verbose?: boolean;
}

export const replayCommand = new Command('replay')
  .description('Re-run the query of a recorded run as a new run')
  .argument('<run-id>', 'Run id or unique id prefix')
  .option('-a, --agent <kind>', 'Agent to use (mock, claude)', parseAgentKind)
  .option('--json', 'Output the new run and its steps as JSON')
  .option('-v, --verbose', 'Show tool arguments and results')
  .action(async (runId: string, options: ReplayOptions, command: Command) => {
    try {
      await withContext(command, { agent: options.agent }, async ctx => {
        const original = await ctx.store.findRun(runId);
        if (!original) {
          throw new UnknownRunError(runId);
        }

        const execution = await executeTraced(ctx.tracer, ctx.agent, original.query, {
          metadata: { ...original.metadata, replayOf: original.id },
        });

        if (options.json) {
          console.log(formatRun(execution.run, execution.steps, { json: true }));
          return;
        }

        console.log(`\n${icons.replay} ${style.bold('Replaying')} ${style.muted(original.id)}`);
        console.log(keyValue('Original status', original.status, 1));
        console.log(formatRun(execution.run, execution.steps, { verbose: options.verbose }));
        if (execution.run.status !== original.status) {
          console.log(keyValue('Changed', style.warning(`${original.status} ${icons.arrow} ${execution.run.status}`), 1));
        }
      });
    } catch (error) {
      failCommand(error);
    }
  });

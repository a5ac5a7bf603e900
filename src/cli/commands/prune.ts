import { Command } from 'commander';
import { failCommand, parseCount, withContext } from '../context.js';
import { icons, style } from '../theme.js';

interface PruneOptions {
  keep: number;
}

export const pruneCommand = new Command('prune')
  .description('Delete finished runs beyond the newest N')
  .option('-k, --keep <count>', 'Number of finished runs to keep', parseCount, 100)
  .action(async (options: PruneOptions, command: Command) => {
    try {
      await withContext(command, {}, async ({ store }) => {
        const deleted = await store.prune(options.keep);
        console.log(`\n${icons.broom} ${style.bold('Pruned')} ${style.number(String(deleted))} run(s), kept the newest ${style.number(String(options.keep))}\n`);
      });
    } catch (error) {
      failCommand(error);
    }
  });

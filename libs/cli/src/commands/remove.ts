/**
 * Remove command
 */

import { Command } from 'commander';
import { createContext } from '../context.js';
import { color, formatEntryLine } from '../output.js';
import { confirm } from '../prompts.js';

export function createRemoveCommand(): Command {
  return new Command('remove')
    .alias('rm')
    .description('Remove an entry')
    .argument('<alias>')
    .option('-y, --yes', 'Skip confirmation prompt')
    .action(async (alias: string, options: { yes?: boolean }) => {
      const ctx = createContext();
      const entry = ctx.session.require(alias);
      console.log(formatEntryLine(entry, ctx.session.usage(alias)));

      if (!options.yes && !(await confirm(ctx.prompter, `Remove '${alias}'?`))) {
        console.log('Kept.');
        return;
      }
      ctx.session.remove(alias);
      console.log(color.green(`✓ Removed '${alias}'`));
    });
}

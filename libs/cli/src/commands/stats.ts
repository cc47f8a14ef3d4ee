/**
 * Stats command
 */

import { Command } from 'commander';
import type { EntryKind } from '@quicklaunch/core';
import { createContext } from '../context.js';
import { color } from '../output.js';
import type { LauncherSession } from '../session.js';

export function statsHeadline(session: LauncherSession): string {
  const entries = session.list();
  const count = (kind: EntryKind) => entries.filter((e) => e.kind === kind).length;
  const total = session.usageSummary().reduce((sum, u) => sum + u.count, 0);
  const head = `${entries.length} entries (${count('link')} links, ${count('chain')} chains, ${count('template')} templates)`;
  return total > 0 ? `${head} • ${total} total uses` : head;
}

export function createStatsCommand(): Command {
  return new Command('stats')
    .description('Show usage statistics')
    .option('-n, --top <count>', 'Number of entries to show', '10')
    .action((options: { top: string }) => {
      const { session } = createContext();
      console.log(color.bold(statsHeadline(session)));

      const top = Number.parseInt(options.top, 10);
      const used = session.usageSummary().slice(0, Number.isNaN(top) ? 10 : top);

      if (used.length === 0) {
        console.log(color.gray('Nothing has been run yet.'));
        return;
      }
      console.log('');
      for (const { alias, count, lastUsed } of used) {
        const last = lastUsed ? color.gray(`  last ${lastUsed.slice(0, 16).replace('T', ' ')}`) : '';
        console.log(`  ${String(count).padStart(4)}× ${color.cyan(alias)}${last}`);
      }
    });
}

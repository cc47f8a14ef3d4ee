/**
 * List command
 */

import { Command } from 'commander';
import { entriesForMode, toRecord } from '@quicklaunch/core';
import type { NavigationMode } from '@quicklaunch/core';
import { createContext } from '../context.js';
import { color, formatEntryLine } from '../output.js';

const SECTIONS: Array<[NavigationMode, string]> = [
  ['command', 'Commands'],
  ['template', 'Templates'],
];

export function createListCommand(): Command {
  return new Command('list')
    .alias('ls')
    .description('Print saved entries')
    .option('-j, --json', 'Output as JSON')
    .option('--templates', 'Only templates')
    .action((options: { json?: boolean; templates?: boolean }) => {
      const { session } = createContext();
      const sections = options.templates ? SECTIONS.filter(([mode]) => mode === 'template') : SECTIONS;

      if (options.json) {
        const entries = sections.flatMap(([mode]) => entriesForMode(session.list(), mode));
        console.log(JSON.stringify(entries.map(toRecord), null, 2));
        return;
      }

      if (session.list().length === 0) {
        console.log('No entries yet. Add one with:');
        console.log(color.cyan('  ql add <alias> <command>'));
        return;
      }

      for (const [mode, title] of sections) {
        const entries = entriesForMode(session.list(), mode);
        if (entries.length === 0) continue;
        console.log(color.bold(`${title} (${entries.length})`));
        for (const entry of entries) {
          console.log(`  ${formatEntryLine(entry, session.usage(entry.alias))}`);
        }
        console.log('');
      }
    });
}

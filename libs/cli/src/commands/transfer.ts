/**
 * export / import commands
 */

import { Command } from 'commander';
import * as path from 'node:path';
import { findConflicts, readImport, writeExport } from '@quicklaunch/storage';
import { createContext } from '../context.js';
import { color } from '../output.js';
import { confirm } from '../prompts.js';

const MAX_LISTED_CONFLICTS = 5;

export function createExportCommand(): Command {
  return new Command('export')
    .description('Write all entries to a file for sharing')
    .argument('<file>')
    .action((file: string) => {
      const { session } = createContext();
      const count = writeExport(path.resolve(file), session.list());
      console.log(color.green(`✓ Exported ${count} entries to ${file}`));
    });
}

export function createImportCommand(): Command {
  return new Command('import')
    .description('Add entries from an export file')
    .argument('<file>')
    .option('-f, --force', 'Overwrite existing entries without asking')
    .action(async (file: string, options: { force?: boolean }) => {
      const ctx = createContext();
      const { entries, skipped } = readImport(path.resolve(file));
      console.log(`Importing ${entries.length} entries from ${file}`);
      for (const line of skipped) console.log(color.yellow(`⚠ skipped ${line}`));

      const conflicts = findConflicts(ctx.session.list(), entries);
      let overwrite = options.force ?? false;
      if (conflicts.length > 0 && !overwrite) {
        const listed = conflicts.slice(0, MAX_LISTED_CONFLICTS).join(', ');
        console.log(color.yellow(`⚠ ${conflicts.length} entries already exist: ${listed}`));
        if (conflicts.length > MAX_LISTED_CONFLICTS) {
          console.log(`    ... and ${conflicts.length - MAX_LISTED_CONFLICTS} more`);
        }
        overwrite = await confirm(ctx.prompter, 'Overwrite existing entries?');
        if (!overwrite) {
          console.log('Import cancelled.');
          return;
        }
      }

      const result = ctx.session.importEntries(entries, overwrite);
      console.log(color.green(`✓ Imported ${result.added.length + result.replaced.length} entries`)
        + (result.replaced.length > 0 ? color.gray(` (${result.replaced.length} replaced)`) : ''));
    });
}

/**
 * add / chain / template commands
 *
 * One factory per entry kind; the three commands differ only in naming and,
 * for templates, placeholder defaults.
 */

import { Command } from 'commander';
import type { EntryKind } from '@quicklaunch/core';
import { checkCommand } from '../command-check.js';
import { createContext } from '../context.js';
import { parseDefaults, parseTags } from '../input.js';
import { color, formatEntryLine } from '../output.js';
import { confirm } from '../prompts.js';
import type { Prompter } from '../prompts.js';

interface AddCommandOptions {
  description?: string;
  tags?: string;
  force?: boolean;
  yes?: boolean;
  default?: string[];
}

const ADD_COMMANDS: Record<EntryKind, { name: string; description: string; argument: string }> = {
  link: { name: 'add', description: 'Save a command under an alias', argument: 'alias' },
  chain: { name: 'chain', description: 'Save commands joined by && that stop at the first failure', argument: 'alias' },
  template: { name: 'template', description: 'Save a command with {placeholders} filled in at run time', argument: 'name' },
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Offer typo corrections and warn about commands missing from PATH.
 * Returns null when the user declines to continue.
 */
export async function reviewCommand(command: string, prompter: Prompter, assumeYes: boolean): Promise<string | null> {
  const check = checkCommand(command);
  let reviewed = command;
  let missing = check.missing;

  if (check.suggestion) {
    console.log(color.yellow(`💡 Did you mean: ${check.suggestion}?`));
    if (assumeYes || (await confirm(prompter, 'Use suggestion?', true))) {
      reviewed = check.suggestion;
      missing = checkCommand(reviewed).missing;
    }
  }

  if (missing) {
    console.log(color.yellow(`⚠ Command '${missing}' not found in PATH`));
    if (!assumeYes && !(await confirm(prompter, 'Continue anyway?'))) return null;
  }

  return reviewed;
}

export function createAddCommand(kind: EntryKind): Command {
  const meta = ADD_COMMANDS[kind];
  const cmd = new Command(meta.name)
    .description(meta.description)
    .argument(`<${meta.argument}>`, 'Letters, digits, - and _')
    .argument('<command...>', 'Command text; quote it when it contains && or other shell operators')
    .option('-d, --description <text>', 'Description shown in the preview')
    .option('-t, --tags <list>', 'Comma-separated search tags')
    .option('-f, --force', 'Replace an existing entry with the same alias')
    .option('-y, --yes', 'Accept suggestions without asking');

  if (kind === 'template') {
    cmd.option('--default <name=value>', 'Default value for a placeholder (repeatable)', collect, []);
  }

  cmd.action(async (alias: string, parts: string[], options: AddCommandOptions) => {
    const ctx = createContext();
    const command = await reviewCommand(parts.join(' '), ctx.prompter, options.yes ?? false);
    if (command === null) {
      console.log('Cancelled.');
      return;
    }

    const entry = ctx.session.add(kind, {
      alias,
      command,
      description: options.description,
      tags: parseTags(options.tags),
      defaults: parseDefaults(options.default ?? []),
    }, { overwrite: options.force });

    console.log(color.green(`✓ Saved ${entry.kind} '${entry.alias}'`));
    console.log(`  ${formatEntryLine(entry, ctx.session.usage(entry.alias))}`);
    if (entry.kind === 'template' && entry.placeholders.length > 0) {
      const names = entry.placeholders.map((p) => (p.default === undefined ? p.name : `${p.name}=${p.default}`));
      console.log(color.gray(`  Placeholders: ${names.join(', ')}`));
    }
  });

  return cmd;
}

/**
 * Edit command
 *
 * Walks through the editable fields with line prompts. Enter keeps the
 * current value and `-` clears an optional one.
 */

import { Command } from 'commander';
import { extractPlaceholders } from '@quicklaunch/core';
import type { EntryPatch } from '@quicklaunch/core';
import { createContext } from '../context.js';
import type { CliContext } from '../context.js';
import { color, formatEntryLine } from '../output.js';
import type { Prompter } from '../prompts.js';

const CLEAR = '-';

/** Ask one field. Returns undefined to keep, null when input ends. */
async function askField(prompter: Prompter, label: string, current: string, clearable: boolean): Promise<string | undefined | null> {
  const answer = await prompter.ask(`${label} ${color.gray(`[${current}]`)}: `);
  if (answer === null) return null;
  const value = answer.trim();
  if (value === '') return undefined;
  if (clearable && value === CLEAR) return '';
  return value;
}

export async function collectEdit(ctx: Pick<CliContext, 'session' | 'prompter'>, alias: string): Promise<EntryPatch | null> {
  const entry = ctx.session.require(alias);
  const { prompter } = ctx;

  const command = await askField(prompter, 'Command', entry.command, false);
  if (command === null) return null;
  const description = await askField(prompter, 'Description', entry.description, true);
  if (description === null) return null;
  const tags = await askField(prompter, 'Tags', entry.tags.join(', '), true);
  if (tags === null) return null;

  const patch: EntryPatch = {
    command,
    description,
    tags: tags === undefined ? undefined : tags.split(','),
  };

  if (entry.kind === 'template') {
    const current = new Map(entry.placeholders.map((p) => [p.name, p.default ?? '']));
    const defaults: Record<string, string> = {};
    for (const name of extractPlaceholders(command ?? entry.command)) {
      const value = await askField(prompter, `Default for {${name}}`, current.get(name) ?? '', true);
      if (value === null) return null;
      if (value !== undefined) defaults[name] = value;
    }
    patch.defaults = defaults;
  }

  return patch;
}

export function createEditCommand(): Command {
  return new Command('edit')
    .description('Edit the command, description, tags or defaults of an entry')
    .argument('<alias>')
    .action(async (alias: string) => {
      const ctx = createContext();
      const entry = ctx.session.require(alias);
      console.log(formatEntryLine(entry, ctx.session.usage(alias)));
      console.log(color.gray(`Enter keeps a value, ${CLEAR} clears an optional one.`));

      const patch = await collectEdit(ctx, alias);
      if (!patch) {
        console.log('\nEdit cancelled.');
        return;
      }
      const updated = ctx.session.update(alias, patch);
      console.log(color.green(`✓ Updated '${updated.alias}'`));
    });
}

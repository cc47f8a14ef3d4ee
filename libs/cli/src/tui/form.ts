/**
 * Create and edit forms of the launcher
 *
 * Turns form text into session calls and maps failures back onto the field
 * that caused them.
 */

import {
  DuplicateAliasError,
  EntryValidationError,
  LauncherError,
  extractPlaceholders,
  inferCommandKind,
} from '@quicklaunch/core';
import type { Entry, EntryKind, NavigationMode } from '@quicklaunch/core';
import { formatDefaultList, parseDefaultList, parseTags } from '../input.js';
import type { LauncherSession } from '../session.js';

export type FormField = 'alias' | 'command' | 'description' | 'tags' | 'defaults';

export type FormValues = Record<FormField, string>;

export interface FormError {
  field: FormField | null;
  message: string;
}

export type FormTarget =
  | { type: 'create'; mode: NavigationMode }
  | { type: 'edit'; entry: Entry };

export type FormOutcome =
  | { ok: true; entry: Entry; message: string }
  | { ok: false; error: FormError };

const FORM_FIELDS: readonly FormField[] = ['alias', 'command', 'description', 'tags', 'defaults'];

function isTemplateForm(target: FormTarget): boolean {
  return target.type === 'create' ? target.mode === 'template' : target.entry.kind === 'template';
}

export function formTitle(target: FormTarget): string {
  if (target.type === 'edit') return `Edit '${target.entry.alias}'`;
  return target.mode === 'template' ? 'New template' : 'New command';
}

/** Fields shown for a target. The alias of an existing entry is fixed. */
export function formFields(target: FormTarget): FormField[] {
  return FORM_FIELDS.filter((field) => {
    if (field === 'alias') return target.type === 'create';
    if (field === 'defaults') return isTemplateForm(target);
    return true;
  });
}

export function initialValues(target: FormTarget): FormValues {
  if (target.type === 'create') {
    return { alias: '', command: '', description: '', tags: '', defaults: '' };
  }
  const { entry } = target;
  return {
    alias: entry.alias,
    command: entry.command,
    description: entry.description,
    tags: entry.tags.join(', '),
    defaults: entry.kind === 'template' ? formatDefaultList(entry.placeholders) : '',
  };
}

function asFormField(field: string): FormField | null {
  return FORM_FIELDS.find((f) => f === field) ?? null;
}

export function toFormError(err: unknown): FormError {
  if (err instanceof EntryValidationError) return { field: asFormField(err.field), message: err.message };
  if (err instanceof DuplicateAliasError) return { field: 'alias', message: err.message };
  if (err instanceof LauncherError) return { field: null, message: err.message };
  throw err;
}

/**
 * Every placeholder of the new command gets the listed default or none, so
 * a name deleted from the list loses its default.
 */
function templateDefaults(command: string, text: string): Record<string, string> {
  const listed = parseDefaultList(text);
  const defaults: Record<string, string> = {};
  for (const name of extractPlaceholders(command)) {
    defaults[name] = listed[name] ?? '';
  }
  return defaults;
}

function kindFor(mode: NavigationMode, command: string): EntryKind {
  return mode === 'template' ? 'template' : inferCommandKind(command);
}

/**
 * Save the form through the session. Validation, duplicate and store
 * failures come back as a form error; anything else is rethrown.
 */
export function submitForm(session: LauncherSession, target: FormTarget, values: FormValues): FormOutcome {
  try {
    if (target.type === 'create') {
      const entry = session.add(kindFor(target.mode, values.command), {
        alias: values.alias,
        command: values.command,
        description: values.description,
        tags: parseTags(values.tags),
        defaults: target.mode === 'template' ? templateDefaults(values.command, values.defaults) : undefined,
      });
      return { ok: true, entry, message: `Added '${entry.alias}'` };
    }

    const { entry } = target;
    const updated = session.update(entry.alias, {
      command: values.command,
      description: values.description,
      tags: parseTags(values.tags),
      defaults: entry.kind === 'template' ? templateDefaults(values.command, values.defaults) : undefined,
    });
    return { ok: true, entry: updated, message: `Updated '${updated.alias}'` };
  } catch (err) {
    return { ok: false, error: toFormError(err) };
  }
}

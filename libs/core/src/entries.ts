/**
 * Entry construction, editing and record mapping
 */

import { EntryValidationError } from './errors.js';
import { ALIAS_PATTERN, EntryRecordSchema } from './schemas.js';
import type { EntryRecord } from './schemas.js';
import { derivePlaceholders } from './template.js';
import { assertNever } from './types.js';
import type { Entry, EntryKind, NavigationMode, Placeholder } from './types.js';
import { splitChain } from './chain.js';

export interface EntryInput {
  alias: string;
  command: string;
  description?: string;
  tags?: string[];
  /** Template only: defaults keyed by placeholder name. */
  defaults?: Record<string, string>;
}

export interface EntryPatch {
  command?: string;
  description?: string;
  tags?: string[];
  defaults?: Record<string, string>;
}

export function normalizeTags(tags: readonly string[]): string[] {
  const cleaned = tags.map((t) => t.trim()).filter((t) => t.length > 0);
  return [...new Set(cleaned)].sort();
}

export function validateAlias(alias: string): string {
  const trimmed = alias.trim();
  if (trimmed === '') {
    throw new EntryValidationError('alias', 'Alias cannot be empty');
  }
  if (!ALIAS_PATTERN.test(trimmed)) {
    throw new EntryValidationError('alias', 'Alias can only contain letters, numbers, hyphens and underscores');
  }
  return trimmed;
}

function validateCommandText(command: string): string {
  const trimmed = command.trim();
  if (trimmed === '') {
    throw new EntryValidationError('command', 'Command cannot be empty');
  }
  return trimmed;
}

const CHAIN_SEGMENTS_MESSAGE = 'A chain needs at least two commands joined by &&';

function applyDefaults(placeholders: Placeholder[], defaults: Record<string, string> | undefined): Placeholder[] {
  if (!defaults) return placeholders;
  return placeholders.map((p) => {
    const value = Object.prototype.hasOwnProperty.call(defaults, p.name) ? defaults[p.name] : undefined;
    if (value === undefined) return p;
    return value === '' ? { name: p.name } : { name: p.name, default: value };
  });
}

/**
 * Build a new entry of `kind`. Throws EntryValidationError on bad input.
 */
export function createEntry(kind: EntryKind, input: EntryInput, now: Date = new Date()): Entry {
  const base = {
    alias: validateAlias(input.alias),
    command: validateCommandText(input.command),
    description: (input.description ?? '').trim(),
    tags: normalizeTags(input.tags ?? []),
    createdAt: now.toISOString(),
  };

  switch (kind) {
    case 'link':
      return { ...base, kind };
    case 'chain':
      if (splitChain(base.command).length < 2) {
        throw new EntryValidationError('command', CHAIN_SEGMENTS_MESSAGE);
      }
      return { ...base, kind };
    case 'template':
      return {
        ...base,
        kind,
        placeholders: applyDefaults(derivePlaceholders(base.command), input.defaults),
      };
    default:
      return assertNever(kind);
  }
}

/**
 * Apply an edit. The kind never changes; template placeholders are
 * recomputed from the new command, keeping surviving defaults.
 */
export function updateEntry(entry: Entry, patch: EntryPatch): Entry {
  const command = patch.command === undefined ? entry.command : validateCommandText(patch.command);
  const description = patch.description === undefined ? entry.description : patch.description.trim();
  const tags = patch.tags === undefined ? entry.tags : normalizeTags(patch.tags);

  switch (entry.kind) {
    case 'link':
      return { ...entry, command, description, tags };
    case 'chain':
      if (splitChain(command).length < 2) {
        throw new EntryValidationError('command', CHAIN_SEGMENTS_MESSAGE);
      }
      return { ...entry, command, description, tags };
    case 'template':
      return {
        ...entry,
        command,
        description,
        tags,
        placeholders: applyDefaults(derivePlaceholders(command, entry.placeholders), patch.defaults),
      };
    default:
      return assertNever(entry);
  }
}

/** Infer the kind for a command typed without an explicit kind. */
export function inferCommandKind(command: string): 'link' | 'chain' {
  return splitChain(command).length > 1 ? 'chain' : 'link';
}

/**
 * Whether a resolved command runs segment by segment. Templates that expand
 * to several `&&` segments run like chains.
 */
export function runsAsChain(kind: EntryKind, command: string): boolean {
  switch (kind) {
    case 'link':
      return false;
    case 'chain':
      return true;
    case 'template':
      return splitChain(command).length > 1;
    default:
      return assertNever(kind);
  }
}

export function kindsForMode(mode: NavigationMode): EntryKind[] {
  switch (mode) {
    case 'command':
      return ['link', 'chain'];
    case 'template':
      return ['template'];
    default:
      return assertNever(mode);
  }
}

export function entriesForMode(entries: Iterable<Entry>, mode: NavigationMode): Entry[] {
  const kinds = kindsForMode(mode);
  return [...entries].filter((e) => kinds.includes(e.kind));
}

export function kindIcon(kind: EntryKind): string {
  switch (kind) {
    case 'link':
      return '🔗';
    case 'chain':
      return '⛓️';
    case 'template':
      return '🎨';
    default:
      return assertNever(kind);
  }
}

// ---- Record mapping ----

export function toRecord(entry: Entry): EntryRecord {
  switch (entry.kind) {
    case 'link':
    case 'chain':
      return {
        alias: entry.alias,
        kind: entry.kind,
        command: entry.command,
        description: entry.description,
        tags: [...entry.tags],
        createdAt: entry.createdAt,
      };
    case 'template':
      return {
        alias: entry.alias,
        kind: entry.kind,
        command: entry.command,
        description: entry.description,
        tags: [...entry.tags],
        placeholders: entry.placeholders.map((p) => ({ ...p })),
        createdAt: entry.createdAt,
      };
    default:
      return assertNever(entry);
  }
}

export type RecordParseResult =
  | { ok: true; entry: Entry }
  | { ok: false; error: string };

/**
 * Validate an unknown value as an entry record. Template placeholders are
 * re-derived from the command so stale lists on disk are corrected.
 */
export function fromRecord(raw: unknown, fallbackCreatedAt: string): RecordParseResult {
  const parsed = EntryRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((i) => `${i.path.join('.') || 'record'}: ${i.message}`).join('; ') };
  }

  const record = parsed.data;
  const base = {
    alias: record.alias,
    command: record.command,
    description: record.description,
    tags: normalizeTags(record.tags),
    createdAt: record.createdAt ?? fallbackCreatedAt,
  };

  switch (record.kind) {
    case 'link':
    case 'chain':
      return { ok: true, entry: { ...base, kind: record.kind } };
    case 'template': {
      const stored: Placeholder[] = record.placeholders.map((p) => (typeof p === 'string' ? { name: p } : p));
      return { ok: true, entry: { ...base, kind: 'template', placeholders: derivePlaceholders(record.command, stored) } };
    }
    default:
      return assertNever(record);
  }
}

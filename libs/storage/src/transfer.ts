/**
 * Export and import of entry sets
 */

import * as fs from 'node:fs';
import { toRecord } from '@quicklaunch/core';
import type { Entry, EntryRecord } from '@quicklaunch/core';
import { writeJsonAtomic } from './atomic-write.js';
import { EXPORT_VERSION } from './constants.js';
import { ImportFormatError } from './errors.js';
import { decodeDocument } from './records.js';

export interface ExportDocument {
  commands: Record<string, EntryRecord>;
  exportedAt: string;
  version: string;
}

export function buildExport(entries: Iterable<Entry>, now: Date = new Date()): ExportDocument {
  const commands: Record<string, EntryRecord> = {};
  for (const entry of entries) {
    commands[entry.alias] = toRecord(entry);
  }
  return { commands, exportedAt: now.toISOString(), version: EXPORT_VERSION };
}

/** Write an export file. Returns the number of entries written. */
export function writeExport(filePath: string, entries: Iterable<Entry>, now: Date = new Date()): number {
  const doc = buildExport(entries, now);
  writeJsonAtomic(filePath, doc);
  return Object.keys(doc.commands).length;
}

export interface ImportResult {
  entries: Entry[];
  /** Records that were skipped, one line each. */
  skipped: string[];
}

/**
 * Read entries from an export file, a store document or a legacy alias map.
 * Throws ImportFormatError when the file cannot be read as a whole.
 */
export function readImport(filePath: string, now: Date = new Date()): ImportResult {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ImportFormatError(filePath, err instanceof Error ? err.message : String(err));
  }

  const decoded = decodeDocument(content, now.toISOString());
  if (decoded.fatal !== null) {
    throw new ImportFormatError(filePath, decoded.fatal);
  }
  return { entries: decoded.entries, skipped: decoded.skipped };
}

/** Aliases present both in the store and in the import, in import order. */
export function findConflicts(existing: Iterable<Entry>, incoming: readonly Entry[]): string[] {
  const aliases = new Set([...existing].map((e) => e.alias));
  return incoming.filter((e) => aliases.has(e.alias)).map((e) => e.alias);
}

export interface MergeResult {
  entries: Entry[];
  added: string[];
  replaced: string[];
  /** Conflicting aliases left untouched because overwrite was off. */
  kept: string[];
}

/**
 * Merge imported entries into the existing collection. Replaced entries keep
 * their position; new ones are appended in import order.
 */
export function mergeImported(existing: Iterable<Entry>, incoming: readonly Entry[], overwrite: boolean): MergeResult {
  const merged = new Map<string, Entry>([...existing].map((e) => [e.alias, e]));
  const added: string[] = [];
  const replaced: string[] = [];
  const kept: string[] = [];

  for (const entry of incoming) {
    if (!merged.has(entry.alias)) {
      added.push(entry.alias);
      merged.set(entry.alias, entry);
    } else if (overwrite) {
      replaced.push(entry.alias);
      merged.set(entry.alias, entry);
    } else {
      kept.push(entry.alias);
    }
  }

  return { entries: [...merged.values()], added, replaced, kept };
}

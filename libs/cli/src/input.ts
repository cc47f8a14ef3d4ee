/**
 * Parsing of free-text entry fields
 */

import { EntryValidationError } from '@quicklaunch/core';

export function parseTags(list: string | undefined): string[] {
  return list ? list.split(',') : [];
}

/** Parse `name=value` pairs. A value may be empty, which clears a default. */
export function parseDefaults(pairs: readonly string[]): Record<string, string> {
  const defaults: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new EntryValidationError('defaults', `Expected name=value, got '${pair}'`);
    }
    defaults[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
  }
  return defaults;
}

/** Parse a comma-separated `name=value, name=value` list. */
export function parseDefaultList(text: string): Record<string, string> {
  const pairs = text.split(',').map((p) => p.trim()).filter((p) => p !== '');
  return parseDefaults(pairs);
}

export function formatDefaultList(placeholders: ReadonlyArray<{ name: string; default?: string }>): string {
  return placeholders
    .filter((p) => p.default !== undefined)
    .map((p) => `${p.name}=${p.default}`)
    .join(', ');
}

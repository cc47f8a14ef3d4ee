/**
 * Core types for quicklaunch
 *
 * Entries are a closed tagged union over `kind`. Every consumer switches on
 * `kind` exhaustively so that adding a kind fails the build at each site.
 */

export type EntryKind = 'link' | 'chain' | 'template';

export interface Placeholder {
  name: string;
  default?: string;
}

interface EntryBase {
  alias: string;
  command: string;
  description: string;
  /** Search-only labels. Stored sorted and de-duplicated. */
  tags: string[];
  createdAt: string;
}

export interface LinkEntry extends EntryBase {
  kind: 'link';
}

export interface ChainEntry extends EntryBase {
  kind: 'chain';
}

export interface TemplateEntry extends EntryBase {
  kind: 'template';
  /** Derived from `command`; recomputed whenever it changes. */
  placeholders: Placeholder[];
}

export type Entry = LinkEntry | ChainEntry | TemplateEntry;

/** Insertion-ordered mapping alias -> entry. */
export type EntryMap = Map<string, Entry>;

export type NavigationMode = 'command' | 'template';

export interface ScoredEntry {
  entry: Entry;
  score: number;
}

/**
 * Minimal logger accepted by the libraries. The CLI supplies a leveled one.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const noopLogger: Logger = {
  debug() { /* no-op */ },
  info() { /* no-op */ },
  warn() { /* no-op */ },
  error() { /* no-op */ },
};

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

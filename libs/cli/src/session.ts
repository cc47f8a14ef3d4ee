/**
 * Launcher session
 *
 * Owns the entry collection, the store it came from, usage statistics and
 * the navigation engine. Every mutation is saved before it becomes visible;
 * a failed save leaves the session unchanged.
 */

import {
  DuplicateAliasError,
  EntryValidationError,
  NavigationEngine,
  NotFoundError,
  buildViewModel,
  createEntry,
  noopLogger,
  updateEntry,
} from '@quicklaunch/core';
import type {
  Entry,
  EntryInput,
  EntryKind,
  EntryMap,
  EntryPatch,
  LauncherError,
  Logger,
  NavigationOptions,
  ViewModel,
} from '@quicklaunch/core';
import { StoreWriteError, mergeImported } from '@quicklaunch/storage';
import type { EntryStore, MergeResult, UsageStats, UsageSummary } from '@quicklaunch/storage';

/** Aliases that would be shadowed by a subcommand. */
export const RESERVED_ALIASES: readonly string[] = [
  'add', 'chain', 'template', 'edit', 'remove', 'rm', 'list', 'ls', 'stats', 'export', 'import', 'help',
];

export interface LauncherSessionOptions {
  store: EntryStore;
  stats: UsageStats;
  logger?: Logger;
  navigation?: NavigationOptions;
  now?: () => Date;
}

export interface AddOptions {
  overwrite?: boolean;
}

export class LauncherSession {
  readonly engine: NavigationEngine;
  readonly loadWarnings: LauncherError[];
  private entries: EntryMap;
  private readonly store: EntryStore;
  private readonly stats: UsageStats;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: LauncherSessionOptions) {
    this.store = options.store;
    this.stats = options.stats;
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? (() => new Date());

    const loaded = this.store.loadAll();
    this.loadWarnings = loaded.warnings;
    this.entries = new Map(loaded.entries.map((e) => [e.alias, e]));
    this.engine = new NavigationEngine(this.entries.values(), options.navigation);
  }

  list(): Entry[] {
    return [...this.entries.values()];
  }

  get(alias: string): Entry | undefined {
    return this.entries.get(alias);
  }

  require(alias: string): Entry {
    const entry = this.entries.get(alias);
    if (!entry) throw new NotFoundError(alias);
    return entry;
  }

  usage(alias: string): number {
    return this.stats.usage(alias);
  }

  add(kind: EntryKind, input: EntryInput, options: AddOptions = {}): Entry {
    const entry = createEntry(kind, input, this.now());
    if (RESERVED_ALIASES.includes(entry.alias)) {
      throw new EntryValidationError('alias', `'${entry.alias}' is a command name and cannot be used as an alias`);
    }

    const existing = this.entries.get(entry.alias);
    if (existing && !options.overwrite) {
      throw new DuplicateAliasError(entry.alias);
    }

    const stored: Entry = existing ? { ...entry, createdAt: existing.createdAt } : entry;
    const next = new Map(this.entries);
    next.set(stored.alias, stored);
    this.commit(next);
    this.logger.debug(`saved ${stored.kind} '${stored.alias}'`);
    return stored;
  }

  update(alias: string, patch: EntryPatch): Entry {
    const updated = updateEntry(this.require(alias), patch);
    const next = new Map(this.entries);
    next.set(alias, updated);
    this.commit(next);
    return updated;
  }

  remove(alias: string): Entry {
    const entry = this.require(alias);
    const next = new Map(this.entries);
    next.delete(alias);
    this.commit(next);
    this.stats.remove(alias);
    return entry;
  }

  importEntries(incoming: readonly Entry[], overwrite: boolean): MergeResult {
    const result = mergeImported(this.entries.values(), incoming, overwrite);
    this.commit(new Map(result.entries.map((e) => [e.alias, e])));
    return result;
  }

  totalUses(): number {
    return this.stats.totalUses();
  }

  /** Usage of entries that still exist, most used first. */
  usageSummary(): UsageSummary[] {
    return this.stats.summary().filter((u) => this.entries.has(u.alias));
  }

  recordRun(alias: string): void {
    this.stats.record(alias, this.now());
  }

  viewModel(width: number, listHeight: number): ViewModel {
    return buildViewModel(this.engine.getState(), {
      listHeight,
      width,
      total: this.engine.modeTotal(),
      usage: (alias) => this.stats.usage(alias),
    });
  }

  private commit(next: EntryMap): void {
    const saved = this.store.saveAll(next.values());
    if (!saved.success) {
      throw new StoreWriteError(this.store.location, saved.error ?? 'unknown error');
    }
    this.entries = next;
    this.engine.setEntries(next.values());
  }
}

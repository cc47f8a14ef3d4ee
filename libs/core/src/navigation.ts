/**
 * Navigation engine
 *
 * Owns mode, query, selection and the filtered view. Events are applied
 * synchronously: when `dispatch` returns, `filtered` already reflects the new
 * query and mode, so a render can never observe a stale list.
 */

import { entriesForMode } from './entries.js';
import { rankEntries } from './matcher.js';
import { assertNever } from './types.js';
import type { Entry, NavigationMode, ScoredEntry } from './types.js';

export interface NavigationState {
  mode: NavigationMode;
  query: string;
  filtered: ScoredEntry[];
  selectedIndex: number | null;
  previewVisible: boolean;
}

export type NavigationEvent =
  | { type: 'char'; char: string }
  | { type: 'backspace' }
  | { type: 'up' }
  | { type: 'down' }
  | { type: 'select-nth'; n: number }
  | { type: 'toggle-mode' }
  | { type: 'toggle-preview' }
  | { type: 'confirm' }
  | { type: 'dry-run' }
  | { type: 'edit' }
  | { type: 'remove' }
  | { type: 'create' }
  | { type: 'cancel' }
  | { type: 'quit' };

export type NavigationIntent =
  | { type: 'execute'; entry: Entry }
  | { type: 'dry-run'; entry: Entry }
  | { type: 'edit'; entry: Entry }
  | { type: 'remove'; entry: Entry }
  | { type: 'create'; mode: NavigationMode }
  | { type: 'quit' };

export interface NavigationOptions {
  mode?: NavigationMode;
  previewVisible?: boolean;
}

/** Highest digit hotkey. */
export const MAX_QUICK_SELECT = 9;

export class NavigationEngine {
  private entries: Entry[];
  private state: NavigationState;

  constructor(entries: Iterable<Entry>, options: NavigationOptions = {}) {
    this.entries = [...entries];
    this.state = this.recompute({
      mode: options.mode ?? 'command',
      query: '',
      filtered: [],
      selectedIndex: null,
      previewVisible: options.previewVisible ?? true,
    });
  }

  getState(): Readonly<NavigationState> {
    return this.state;
  }

  /** Entries of the active mode, before filtering. */
  modeTotal(): number {
    return entriesForMode(this.entries, this.state.mode).length;
  }

  selectedEntry(): Entry | null {
    const { selectedIndex, filtered } = this.state;
    if (selectedIndex === null) return null;
    return filtered[selectedIndex]?.entry ?? null;
  }

  /**
   * Replace the entry collection after a store mutation. Query and mode are
   * kept; the selection stays on the same alias when it still matches.
   */
  setEntries(entries: Iterable<Entry>): void {
    const previous = this.selectedEntry()?.alias;
    this.entries = [...entries];
    const next = this.recompute({ ...this.state });
    if (previous !== undefined) {
      const index = next.filtered.findIndex((s) => s.entry.alias === previous);
      if (index !== -1) next.selectedIndex = index;
    }
    this.state = next;
  }

  /**
   * Apply one input event. Returns the intent it produced, if any.
   */
  dispatch(event: NavigationEvent): NavigationIntent | null {
    const s = this.state;

    switch (event.type) {
      case 'char': {
        if (event.char === '') return null;
        this.state = this.recompute({ ...s, query: s.query + event.char });
        return null;
      }
      case 'backspace': {
        if (s.query === '') return null;
        this.state = this.recompute({ ...s, query: Array.from(s.query).slice(0, -1).join('') });
        return null;
      }
      case 'up': {
        if (s.selectedIndex === null || s.selectedIndex === 0) return null;
        this.state = { ...s, selectedIndex: s.selectedIndex - 1 };
        return null;
      }
      case 'down': {
        if (s.selectedIndex === null || s.selectedIndex >= s.filtered.length - 1) return null;
        this.state = { ...s, selectedIndex: s.selectedIndex + 1 };
        return null;
      }
      case 'select-nth': {
        if (!Number.isInteger(event.n) || event.n < 1 || event.n > MAX_QUICK_SELECT) return null;
        if (event.n > s.filtered.length) return null;
        this.state = { ...s, selectedIndex: event.n - 1 };
        return null;
      }
      case 'toggle-mode': {
        const mode: NavigationMode = s.mode === 'command' ? 'template' : 'command';
        this.state = this.recompute({ ...s, mode, query: '' });
        return null;
      }
      case 'toggle-preview': {
        this.state = { ...s, previewVisible: !s.previewVisible };
        return null;
      }
      case 'confirm':
      case 'dry-run':
      case 'edit':
      case 'remove': {
        const entry = this.selectedEntry();
        if (!entry) return null;
        return event.type === 'confirm' ? { type: 'execute', entry } : { type: event.type, entry };
      }
      case 'create':
        return { type: 'create', mode: s.mode };
      case 'cancel': {
        if (s.query !== '') {
          this.state = this.recompute({ ...s, query: '' });
          return null;
        }
        return { type: 'quit' };
      }
      case 'quit':
        return { type: 'quit' };
      default:
        return assertNever(event);
    }
  }

  private recompute(next: NavigationState): NavigationState {
    const filtered = rankEntries(entriesForMode(this.entries, next.mode), next.query);
    return {
      ...next,
      filtered,
      selectedIndex: filtered.length === 0 ? null : 0,
    };
  }
}

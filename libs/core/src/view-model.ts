/**
 * Read-only view model handed to the renderer
 */

import { splitChain } from './chain.js';
import { kindIcon } from './entries.js';
import type { NavigationState } from './navigation.js';
import { MAX_QUICK_SELECT } from './navigation.js';
import { inspectCommand } from './safety.js';
import { assertNever } from './types.js';
import type { Entry, EntryKind, NavigationMode } from './types.js';

const ELLIPSIS = '…';

/**
 * Truncate to at most `max` code points, ending with an ellipsis when cut.
 * Surrogate pairs are never split.
 */
export function truncateText(text: string, max: number): string {
  if (max <= 0) return '';
  const chars = Array.from(text);
  if (chars.length <= max) return text;
  if (max === 1) return ELLIPSIS;
  return chars.slice(0, max - 1).join('') + ELLIPSIS;
}

/** Collapse newlines and runs of whitespace for single-line display. */
export function singleLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export interface VisibleEntry {
  alias: string;
  kind: EntryKind;
  icon: string;
  displayText: string;
  score: number;
  isSelected: boolean;
  /** Position in the filtered list (0-based). */
  index: number;
  /** Digit that quick-selects this row, if any. */
  hotkey: number | null;
}

export interface PreviewLine {
  label: string;
  value: string;
}

export interface ViewModel {
  mode: NavigationMode;
  query: string;
  visibleEntries: VisibleEntry[];
  previewVisible: boolean;
  previewContent: PreviewLine[] | null;
  /** Entries of the active mode before filtering. */
  total: number;
  matched: number;
  /** Rows hidden above and below the window. */
  hiddenAbove: number;
  hiddenBelow: number;
}

export interface ViewModelOptions {
  /** Rows in the entry window. */
  listHeight: number;
  /** Terminal columns available for one row. */
  width: number;
  total: number;
  usage?: (alias: string) => number;
}

/** Window of `height` rows that keeps the selection visible. */
export function visibleWindow(count: number, selected: number | null, height: number): { start: number; end: number } {
  const size = Math.max(1, height);
  if (count <= size) return { start: 0, end: count };
  const sel = selected ?? 0;
  const start = Math.min(Math.max(0, sel - Math.floor(size / 2)), count - size);
  return { start, end: start + size };
}

function previewFor(entry: Entry, width: number, usage: number): PreviewLine[] {
  const lines: PreviewLine[] = [];
  if (entry.description) lines.push({ label: 'Description', value: truncateText(singleLine(entry.description), width) });
  if (entry.tags.length > 0) lines.push({ label: 'Tags', value: truncateText(entry.tags.join(', '), width) });
  if (usage > 0) lines.push({ label: 'Used', value: `${usage} time${usage === 1 ? '' : 's'}` });

  switch (entry.kind) {
    case 'link':
      lines.push({ label: 'Command', value: truncateText(singleLine(entry.command), width) });
      break;
    case 'chain':
      splitChain(entry.command).forEach((segment, i) => {
        lines.push({ label: `Step ${i + 1}`, value: truncateText(singleLine(segment), width) });
      });
      break;
    case 'template': {
      lines.push({ label: 'Template', value: truncateText(singleLine(entry.command), width) });
      const names = entry.placeholders.map((p) => (p.default === undefined ? p.name : `${p.name}=${p.default}`));
      if (names.length > 0) lines.push({ label: 'Placeholders', value: truncateText(names.join(', '), width) });
      break;
    }
    default:
      return assertNever(entry);
  }

  for (const warning of inspectCommand(entry.command)) {
    lines.push({ label: 'Warning', value: warning.message });
  }
  return lines;
}

export function buildViewModel(state: Readonly<NavigationState>, options: ViewModelOptions): ViewModel {
  const { start, end } = visibleWindow(state.filtered.length, state.selectedIndex, options.listHeight);
  const aliasWidth = Math.min(
    24,
    state.filtered.slice(start, end).reduce((w, s) => Math.max(w, Array.from(s.entry.alias).length), 0),
  );
  // "NN. icon alias  → " prefix
  const commandWidth = Math.max(10, options.width - aliasWidth - 10);

  const visibleEntries: VisibleEntry[] = state.filtered.slice(start, end).map((scored, offset) => {
    const index = start + offset;
    const { entry } = scored;
    return {
      alias: entry.alias,
      kind: entry.kind,
      icon: kindIcon(entry.kind),
      displayText: truncateText(singleLine(entry.command), commandWidth),
      score: scored.score,
      isSelected: index === state.selectedIndex,
      index,
      hotkey: index < MAX_QUICK_SELECT ? index + 1 : null,
    };
  });

  const selected = state.selectedIndex === null ? null : state.filtered[state.selectedIndex]?.entry ?? null;
  const previewContent = state.previewVisible && selected
    ? previewFor(selected, Math.max(10, options.width - 16), options.usage?.(selected.alias) ?? 0)
    : null;

  return {
    mode: state.mode,
    query: state.query,
    visibleEntries,
    previewVisible: state.previewVisible,
    previewContent,
    total: options.total,
    matched: state.filtered.length,
    hiddenAbove: start,
    hiddenBelow: state.filtered.length - end,
  };
}

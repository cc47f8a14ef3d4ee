/**
 * Terminal key presses to navigation events
 */

import type { NavigationEvent } from '@quicklaunch/core';

/** The parts of ink's key object the launcher reads. */
export interface KeyPress {
  upArrow: boolean;
  downArrow: boolean;
  return: boolean;
  escape: boolean;
  ctrl: boolean;
  tab: boolean;
  backspace: boolean;
  delete: boolean;
  meta: boolean;
}

const CTRL_BINDINGS: Readonly<Record<string, NavigationEvent>> = {
  c: { type: 'quit' },
  p: { type: 'toggle-preview' },
  d: { type: 'dry-run' },
  e: { type: 'edit' },
  r: { type: 'remove' },
  n: { type: 'create' },
};

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g;

export function mapKey(input: string, key: KeyPress): NavigationEvent | null {
  // ink flags every byte up to \u001A as ctrl, Tab and \b included, so the
  // named keys are checked first.
  if (key.escape) return { type: 'cancel' };
  if (key.return) return { type: 'confirm' };
  if (key.tab) return { type: 'toggle-mode' };
  // Most terminals send DEL for backspace, which ink reports as `delete`.
  if (key.backspace || key.delete) return { type: 'backspace' };
  if (key.ctrl) {
    return Object.prototype.hasOwnProperty.call(CTRL_BINDINGS, input) ? CTRL_BINDINGS[input] : null;
  }
  if (key.upArrow) return { type: 'up' };
  if (key.downArrow) return { type: 'down' };
  if (key.meta) return null;

  if (/^[1-9]$/.test(input)) return { type: 'select-nth', n: Number(input) };

  const text = input.replace(CONTROL_CHARS, '');
  return text === '' ? null : { type: 'char', char: text };
}

export const KEY_HINTS: ReadonlyArray<[string, string]> = [
  ['↑↓', 'move'],
  ['1-9', 'pick'],
  ['Enter', 'run'],
  ['Tab', 'mode'],
  ['^P', 'preview'],
  ['^D', 'dry run'],
  ['^N', 'new'],
  ['^E', 'edit'],
  ['^R', 'remove'],
  ['Esc', 'clear/quit'],
];

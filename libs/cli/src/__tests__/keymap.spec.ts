/**
 * Key mapping tests
 */

import { mapKey } from '../keymap';
import type { KeyPress } from '../keymap';

function key(overrides: Partial<KeyPress> = {}): KeyPress {
  return {
    upArrow: false,
    downArrow: false,
    return: false,
    escape: false,
    ctrl: false,
    tab: false,
    backspace: false,
    delete: false,
    meta: false,
    ...overrides,
  };
}

describe('mapKey', () => {
  it('maps typed text to a char event', () => {
    expect(mapKey('d', key())).toEqual({ type: 'char', char: 'd' });
    expect(mapKey('é', key())).toEqual({ type: 'char', char: 'é' });
  });

  it('reserves digits 1-9 for quick select', () => {
    expect(mapKey('3', key())).toEqual({ type: 'select-nth', n: 3 });
    expect(mapKey('0', key())).toEqual({ type: 'char', char: '0' });
  });

  it('maps navigation keys', () => {
    expect(mapKey('', key({ upArrow: true }))).toEqual({ type: 'up' });
    expect(mapKey('', key({ downArrow: true }))).toEqual({ type: 'down' });
    expect(mapKey('', key({ return: true }))).toEqual({ type: 'confirm' });
    expect(mapKey('', key({ tab: true }))).toEqual({ type: 'toggle-mode' });
    expect(mapKey('', key({ escape: true }))).toEqual({ type: 'cancel' });
  });

  it('maps Tab and backspace as ink reports them, with ctrl set', () => {
    expect(mapKey('', key({ tab: true, ctrl: true }))).toEqual({ type: 'toggle-mode' });
    expect(mapKey('i', key({ tab: true, ctrl: true }))).toEqual({ type: 'toggle-mode' });
    expect(mapKey('', key({ backspace: true, ctrl: true }))).toEqual({ type: 'backspace' });
    expect(mapKey('h', key({ backspace: true, ctrl: true }))).toEqual({ type: 'backspace' });
  });

  it('treats backspace and delete alike', () => {
    expect(mapKey('', key({ backspace: true }))).toEqual({ type: 'backspace' });
    expect(mapKey('', key({ delete: true }))).toEqual({ type: 'backspace' });
  });

  it('maps control bindings', () => {
    expect(mapKey('p', key({ ctrl: true }))).toEqual({ type: 'toggle-preview' });
    expect(mapKey('d', key({ ctrl: true }))).toEqual({ type: 'dry-run' });
    expect(mapKey('e', key({ ctrl: true }))).toEqual({ type: 'edit' });
    expect(mapKey('r', key({ ctrl: true }))).toEqual({ type: 'remove' });
    expect(mapKey('n', key({ ctrl: true }))).toEqual({ type: 'create' });
    expect(mapKey('c', key({ ctrl: true }))).toEqual({ type: 'quit' });
  });

  it('ignores unbound control and meta keys', () => {
    expect(mapKey('x', key({ ctrl: true }))).toBeNull();
    expect(mapKey('toString', key({ ctrl: true }))).toBeNull();
    expect(mapKey('f', key({ meta: true }))).toBeNull();
  });

  it('strips control characters from pasted text', () => {
    expect(mapKey('de\u0007p', key())).toEqual({ type: 'char', char: 'dep' });
    expect(mapKey('\u0001', key())).toBeNull();
  });
});

/**
 * View model tests
 */

import { createEntry } from '../entries';
import { NavigationEngine } from '../navigation';
import { buildViewModel, truncateText, visibleWindow } from '../view-model';

const NOW = new Date('2026-01-01T00:00:00.000Z');

describe('truncateText', () => {
  it('keeps short text', () => {
    expect(truncateText('ls', 5)).toBe('ls');
  });

  it('cuts by code point', () => {
    expect(truncateText('héllo wörld', 5)).toBe('héll…');
    expect(truncateText('😀😀😀', 2)).toBe('😀…');
  });

  it('handles tiny widths', () => {
    expect(truncateText('abc', 1)).toBe('…');
    expect(truncateText('abc', 0)).toBe('');
  });
});

describe('visibleWindow', () => {
  it('shows everything when it fits', () => {
    expect(visibleWindow(3, 0, 5)).toEqual({ start: 0, end: 3 });
  });

  it('centres the selection', () => {
    expect(visibleWindow(20, 10, 5)).toEqual({ start: 8, end: 13 });
  });

  it('clamps at the end', () => {
    expect(visibleWindow(20, 15, 5)).toEqual({ start: 13, end: 18 });
    expect(visibleWindow(20, 19, 5)).toEqual({ start: 15, end: 20 });
  });
});

describe('buildViewModel', () => {
  const entries = [
    createEntry('link', { alias: 'logs', command: 'journalctl -f' }, NOW),
    createEntry('chain', { alias: 'deploy', command: 'git pull && npm run build' }, NOW),
    createEntry('link', { alias: 'build', command: 'npm run build' }, NOW),
    createEntry('template', { alias: 'clone', command: 'git clone {repo} {dir}', defaults: { dir: 'src' } }, NOW),
  ];

  it('windows the list around the selection', () => {
    const engine = new NavigationEngine(entries);
    engine.dispatch({ type: 'down' });
    engine.dispatch({ type: 'down' });
    const vm = buildViewModel(engine.getState(), { listHeight: 2, width: 80, total: engine.modeTotal() });
    expect(vm.visibleEntries.map((v) => [v.alias, v.hotkey, v.isSelected])).toEqual([
      ['deploy', 2, false],
      ['logs', 3, true],
    ]);
    expect(vm.hiddenAbove).toBe(1);
    expect(vm.hiddenBelow).toBe(0);
    expect(vm.total).toBe(3);
    expect(vm.matched).toBe(3);
    expect(vm.previewContent).toEqual([{ label: 'Command', value: 'journalctl -f' }]);
  });

  it('truncates commands to the available width', () => {
    const engine = new NavigationEngine(entries);
    engine.dispatch({ type: 'down' });
    engine.dispatch({ type: 'down' });
    const vm = buildViewModel(engine.getState(), { listHeight: 2, width: 30, total: 3 });
    expect(vm.visibleEntries[0].displayText).toBe('git pull && n…');
  });

  it('lists chain steps and usage in the preview', () => {
    const engine = new NavigationEngine(entries);
    engine.dispatch({ type: 'down' });
    const vm = buildViewModel(engine.getState(), { listHeight: 5, width: 80, total: 3, usage: () => 3 });
    expect(vm.previewContent).toEqual([
      { label: 'Used', value: '3 times' },
      { label: 'Step 1', value: 'git pull' },
      { label: 'Step 2', value: 'npm run build' },
    ]);
  });

  it('shows template placeholders with defaults', () => {
    const engine = new NavigationEngine(entries, { mode: 'template' });
    const vm = buildViewModel(engine.getState(), { listHeight: 5, width: 80, total: 1 });
    expect(vm.visibleEntries[0].icon).toBe('🎨');
    expect(vm.previewContent).toEqual([
      { label: 'Template', value: 'git clone {repo} {dir}' },
      { label: 'Placeholders', value: 'repo, dir=src' },
    ]);
  });

  it('has no preview when it is hidden', () => {
    const engine = new NavigationEngine(entries, { previewVisible: false });
    const vm = buildViewModel(engine.getState(), { listHeight: 5, width: 80, total: 3 });
    expect(vm.previewVisible).toBe(false);
    expect(vm.previewContent).toBeNull();
  });
});

/**
 * Entry construction and record mapping tests
 */

import {
  createEntry,
  entriesForMode,
  fromRecord,
  inferCommandKind,
  normalizeTags,
  runsAsChain,
  toRecord,
  updateEntry,
} from '../entries';
import { EntryValidationError } from '../errors';

const NOW = new Date('2026-01-01T00:00:00.000Z');

describe('createEntry', () => {
  it('builds a link with trimmed fields', () => {
    const entry = createEntry('link', { alias: ' logs ', command: ' journalctl -f ', description: ' tail ' }, NOW);
    expect(entry).toEqual({
      alias: 'logs',
      kind: 'link',
      command: 'journalctl -f',
      description: 'tail',
      tags: [],
      createdAt: '2026-01-01T00:00:00.000Z',
    });
  });

  it('rejects an empty alias', () => {
    expect(() => createEntry('link', { alias: '  ', command: 'ls' })).toThrow('Alias cannot be empty');
  });

  it('rejects an alias with spaces', () => {
    expect(() => createEntry('link', { alias: 'my logs', command: 'ls' })).toThrow(EntryValidationError);
  });

  it('rejects an empty command', () => {
    expect(() => createEntry('link', { alias: 'x', command: '   ' })).toThrow('Command cannot be empty');
  });

  it('requires at least two segments for a chain', () => {
    expect(() => createEntry('chain', { alias: 'x', command: 'make' })).toThrow(
      'A chain needs at least two commands joined by &&',
    );
  });

  it('derives template placeholders and applies known defaults', () => {
    const entry = createEntry('template', {
      alias: 'backup',
      command: 'tar -czf {out} {dir}',
      defaults: { dir: '.', unused: 'x' },
    }, NOW);
    expect(entry.kind === 'template' ? entry.placeholders : null).toEqual([
      { name: 'out' },
      { name: 'dir', default: '.' },
    ]);
  });
});

describe('normalizeTags', () => {
  it('trims, de-duplicates and sorts', () => {
    expect(normalizeTags([' b', 'a', 'b', ''])).toEqual(['a', 'b']);
  });
});

describe('updateEntry', () => {
  const template = createEntry('template', { alias: 'backup', command: 'tar -czf {out} {dir}', defaults: { dir: '.' } }, NOW);

  it('keeps the kind and recomputes placeholders', () => {
    const updated = updateEntry(template, { command: 'tar -czf {out} {src}', defaults: { src: '/' } });
    expect(updated.kind).toBe('template');
    expect(updated.kind === 'template' ? updated.placeholders : null).toEqual([
      { name: 'out' },
      { name: 'src', default: '/' },
    ]);
  });

  it('clears a default given as an empty string', () => {
    const updated = updateEntry(template, { defaults: { dir: '' } });
    expect(updated.kind === 'template' ? updated.placeholders : null).toEqual([{ name: 'out' }, { name: 'dir' }]);
  });

  it('keeps a chain at two or more segments', () => {
    const chain = createEntry('chain', { alias: 'ship', command: 'make && make install' }, NOW);
    expect(() => updateEntry(chain, { command: 'make' })).toThrow(EntryValidationError);
    expect(updateEntry(chain, { command: 'make && make test' }).command).toBe('make && make test');
  });

  it('leaves untouched fields alone', () => {
    const link = createEntry('link', { alias: 'l', command: 'ls', tags: ['fs'] }, NOW);
    expect(updateEntry(link, { description: 'list' })).toEqual({ ...link, description: 'list' });
  });
});

describe('inferCommandKind', () => {
  it('treats && outside quotes as a chain', () => {
    expect(inferCommandKind('make && make test')).toBe('chain');
    expect(inferCommandKind('echo "a && b"')).toBe('link');
  });
});

describe('entriesForMode', () => {
  it('splits kinds between the two modes', () => {
    const entries = [
      createEntry('link', { alias: 'a', command: 'ls' }, NOW),
      createEntry('template', { alias: 'b', command: 'echo {x}' }, NOW),
    ];
    expect(entriesForMode(entries, 'command').map((e) => e.alias)).toEqual(['a']);
    expect(entriesForMode(entries, 'template').map((e) => e.alias)).toEqual(['b']);
  });
});

describe('record mapping', () => {
  it('round-trips a fully populated template', () => {
    const entry = createEntry('template', {
      alias: 'deploy-to',
      command: 'rsync -a ./dist {host}:{path}',
      description: 'Push the build',
      tags: ['ops'],
      defaults: { path: '/srv/www' },
    }, NOW);
    expect(fromRecord(toRecord(entry), 'unused')).toEqual({ ok: true, entry });
  });

  it('fills optional fields', () => {
    expect(fromRecord({ alias: 'x', kind: 'link', command: 'ls' }, '2025-05-05T00:00:00.000Z')).toEqual({
      ok: true,
      entry: { alias: 'x', kind: 'link', command: 'ls', description: '', tags: [], createdAt: '2025-05-05T00:00:00.000Z' },
    });
  });

  it('re-derives stale template placeholders', () => {
    const result = fromRecord(
      { alias: 't', kind: 'template', command: 'ls {dir}', placeholders: ['stale', { name: 'dir', default: '.' }] },
      'now',
    );
    expect(result.ok && result.entry.kind === 'template' ? result.entry.placeholders : null).toEqual([
      { name: 'dir', default: '.' },
    ]);
  });

  it('rejects invalid records', () => {
    expect(fromRecord({ alias: 'bad alias', kind: 'link', command: 'ls' }, 'now').ok).toBe(false);
    expect(fromRecord({ alias: 'x', kind: 'script', command: 'ls' }, 'now').ok).toBe(false);
    expect(fromRecord('ls -la', 'now').ok).toBe(false);
  });
});

describe('runsAsChain', () => {
  it('splits chains and multi-segment templates only', () => {
    expect(runsAsChain('link', 'make && make test')).toBe(false);
    expect(runsAsChain('chain', 'make && make test')).toBe(true);
    expect(runsAsChain('template', 'git clone r && cd r')).toBe(true);
    expect(runsAsChain('template', 'echo r')).toBe(false);
  });
});

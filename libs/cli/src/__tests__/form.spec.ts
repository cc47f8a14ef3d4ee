/**
 * Launcher form tests
 */

import { createEntry } from '@quicklaunch/core';
import type { Entry } from '@quicklaunch/core';
import type { LauncherSession } from '../session';
import { formFields, formTitle, initialValues, submitForm } from '../tui/form';
import type { FormValues } from '../tui/form';
import { MemoryEntryStore, NOW, createTempDir, makeSession } from './fakes';

const clone = createEntry('template', {
  alias: 'clone',
  command: 'git clone {repo} {dir}',
  tags: ['vcs', 'git'],
  defaults: { dir: 'src' },
}, NOW);
const logs = createEntry('link', { alias: 'logs', command: 'journalctl -f' }, NOW);

function values(overrides: Partial<FormValues>): FormValues {
  return { alias: '', command: '', description: '', tags: '', defaults: '', ...overrides };
}

describe('form layout', () => {
  it('shows defaults for templates and the alias only when creating', () => {
    expect(formFields({ type: 'create', mode: 'command' })).toEqual(['alias', 'command', 'description', 'tags']);
    expect(formFields({ type: 'create', mode: 'template' })).toEqual(['alias', 'command', 'description', 'tags', 'defaults']);
    expect(formFields({ type: 'edit', entry: logs })).toEqual(['command', 'description', 'tags']);
  });

  it('titles the form by target', () => {
    expect(formTitle({ type: 'create', mode: 'template' })).toBe('New template');
    expect(formTitle({ type: 'edit', entry: logs })).toBe("Edit 'logs'");
  });

  it('fills an edit form from the entry', () => {
    expect(initialValues({ type: 'edit', entry: clone })).toEqual({
      alias: 'clone',
      command: 'git clone {repo} {dir}',
      description: '',
      tags: 'git, vcs',
      defaults: 'dir=src',
    });
  });
});

describe('submitForm', () => {
  let cleanup: () => void;
  let store: MemoryEntryStore;
  let session: LauncherSession;

  beforeEach(() => {
    let dir: string;
    ({ dir, cleanup } = createTempDir());
    store = new MemoryEntryStore([logs, clone]);
    session = makeSession(dir, store);
  });

  afterEach(() => {
    cleanup();
  });

  it('infers a chain from && in command mode', () => {
    const outcome = submitForm(session, { type: 'create', mode: 'command' }, values({ alias: 'ship', command: 'git pull && make' }));
    expect(outcome).toMatchObject({ ok: true, message: "Added 'ship'", entry: { kind: 'chain' } });
  });

  it('creates a template with the listed defaults', () => {
    const outcome = submitForm(
      session,
      { type: 'create', mode: 'template' },
      values({ alias: 'pack', command: 'tar czf {out} {dir}', defaults: 'dir=src' }),
    );
    const entry: Entry | undefined = outcome.ok ? outcome.entry : undefined;
    expect(entry?.kind === 'template' ? entry.placeholders : null).toEqual([{ name: 'out' }, { name: 'dir', default: 'src' }]);
  });

  it('points a bad alias at the alias field', () => {
    const outcome = submitForm(session, { type: 'create', mode: 'command' }, values({ alias: 'my alias', command: 'ls' }));
    expect(outcome).toEqual({
      ok: false,
      error: { field: 'alias', message: 'Alias can only contain letters, numbers, hyphens and underscores' },
    });
  });

  it('points a duplicate at the alias field', () => {
    const outcome = submitForm(session, { type: 'create', mode: 'command' }, values({ alias: 'logs', command: 'ls' }));
    expect(outcome).toEqual({ ok: false, error: { field: 'alias', message: "Entry 'logs' already exists" } });
  });

  it('points an empty command at the command field', () => {
    const outcome = submitForm(session, { type: 'edit', entry: logs }, values({ command: '  ' }));
    expect(outcome).toEqual({ ok: false, error: { field: 'command', message: 'Command cannot be empty' } });
  });

  it('points a malformed defaults list at the defaults field', () => {
    const outcome = submitForm(session, { type: 'edit', entry: clone }, values({ command: clone.command, defaults: 'dir' }));
    expect(outcome).toEqual({ ok: false, error: { field: 'defaults', message: "Expected name=value, got 'dir'" } });
  });

  it('drops a default that was removed from the list', () => {
    const outcome = submitForm(session, { type: 'edit', entry: clone }, values({ command: clone.command, tags: 'git' }));
    expect(outcome.ok).toBe(true);
    const saved = session.get('clone');
    expect(saved?.kind === 'template' ? saved.placeholders : null).toEqual([{ name: 'repo' }, { name: 'dir' }]);
    expect(saved?.tags).toEqual(['git']);
  });

  it('reports a failed save without a field', () => {
    store.failWith = 'disk full';
    const outcome = submitForm(session, { type: 'edit', entry: logs }, values({ command: 'journalctl -fu app' }));
    expect(outcome).toEqual({ ok: false, error: { field: null, message: 'Could not write memory://entries: disk full' } });
  });
});

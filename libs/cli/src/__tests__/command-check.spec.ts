/**
 * Command check tests
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { checkCommand, findExecutable } from '../command-check';
import { createTempDir } from './fakes';

const onPath = (...names: string[]) => (name: string): string | null =>
  names.includes(name) ? `/usr/bin/${name}` : null;

describe('checkCommand', () => {
  it('suggests a fix for a known typo, keeping the arguments', () => {
    expect(checkCommand('gitpush origin main', onPath('git'))).toEqual({
      suggestion: 'git push origin main',
      missing: 'gitpush',
    });
  });

  it('reports a first word that is not on PATH', () => {
    expect(checkCommand('frobnicate --all', onPath('git'))).toEqual({ suggestion: null, missing: 'frobnicate' });
  });

  it('accepts a command found on PATH', () => {
    expect(checkCommand('git status', onPath('git'))).toEqual({ suggestion: null, missing: null });
  });

  it('does not look up builtins, relative scripts, assignments or expansions', () => {
    const lookup = onPath();
    expect(checkCommand('cd /srv/app', lookup).missing).toBeNull();
    expect(checkCommand('./run.sh', lookup).missing).toBeNull();
    expect(checkCommand('NODE_ENV=production node app.js', lookup).missing).toBeNull();
    expect(checkCommand('${EDITOR} notes.md', lookup).missing).toBeNull();
    expect(checkCommand('{tool} --help', lookup).missing).toBeNull();
  });
});

describe('findExecutable', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = createTempDir());
    fs.writeFileSync(path.join(dir, 'deploy-tool'), '#!/bin/sh\n', { mode: 0o755 });
    fs.writeFileSync(path.join(dir, 'notes'), 'text\n', { mode: 0o644 });
    fs.mkdirSync(path.join(dir, 'subdir'));
  });

  afterEach(() => {
    cleanup();
  });

  it('finds an executable file on PATH', () => {
    expect(findExecutable('deploy-tool', { PATH: dir })).toBe(path.join(dir, 'deploy-tool'));
  });

  it('skips files without an execute bit and directories', () => {
    expect(findExecutable('notes', { PATH: dir })).toBeNull();
    expect(findExecutable('subdir', { PATH: dir })).toBeNull();
  });

  it('checks a path containing a slash directly', () => {
    const full = path.join(dir, 'deploy-tool');
    expect(findExecutable(full, { PATH: '' })).toBe(full);
  });
});

/**
 * Console formatting tests
 */

import { createEntry } from '@quicklaunch/core';
import type { ExecutionResult } from '@quicklaunch/core';
import { formatEntryLine, formatPlan, formatResult, formatWarnings } from '../output';
import { NOW } from './fakes';

const plain = (line: string): string => line.replace(/\x1b\[[0-9;]*m/g, '');

function result(overrides: Partial<ExecutionResult>): ExecutionResult {
  return {
    status: 'success',
    command: 'make',
    segments: ['make'],
    segmentsRun: [],
    exitCode: 0,
    firstFailedSegment: null,
    warnings: [],
    ...overrides,
  };
}

describe('formatResult', () => {
  it('reports success', () => {
    expect(formatResult('build', result({})).map(plain)).toEqual(['✓ build finished']);
  });

  it('names the failing step of a chain and the reason', () => {
    const failed = result({
      status: 'failed',
      command: 'cd /nope && make',
      segments: ['cd /nope', 'make'],
      exitCode: 1,
      firstFailedSegment: 0,
      error: 'cd: no such directory: /nope',
    });
    expect(formatResult('ship', failed).map(plain)).toEqual([
      '✗ ship failed (exit 1) at step 1: cd /nope',
      'cd: no such directory: /nope',
    ]);
  });

  it('leaves out the step for a single command', () => {
    const failed = result({ status: 'failed', exitCode: 3, firstFailedSegment: 0 });
    expect(formatResult('build', failed).map(plain)).toEqual(['✗ build failed (exit 3)']);
  });

  it('reports a command that could not start', () => {
    const failed = result({ status: 'spawn-failure', exitCode: 127, firstFailedSegment: 0, error: 'spawn /bin/nosh ENOENT' });
    expect(formatResult('build', failed).map(plain)).toEqual(['✗ build could not start: spawn /bin/nosh ENOENT']);
  });
});

describe('formatPlan', () => {
  it('prints a single command on one line', () => {
    const plan = { command: 'make', chained: false, segments: ['make'], warnings: [] };
    expect(formatPlan(plan).map(plain)).toEqual(['Dry run (nothing will be executed)', '  make']);
  });
});

describe('formatWarnings', () => {
  it('lists suggestions under their warning', () => {
    const lines = formatWarnings([
      { id: 'sudo-cd', message: "'sudo cd' does not change the directory", suggestions: ['cd /srv && ls'] },
    ]);
    expect(lines.map(plain)).toEqual(["⚠ 'sudo cd' does not change the directory", '    cd /srv && ls']);
  });
});

describe('formatEntryLine', () => {
  it('shows icon, alias, usage, command and description', () => {
    const entry = createEntry('link', { alias: 'logs', command: 'journalctl -f', description: 'Follow logs' }, NOW);
    expect(plain(formatEntryLine(entry, 4))).toBe('🔗 logs (4) → journalctl -f  # Follow logs');
    expect(plain(formatEntryLine(entry, 0))).toBe('🔗 logs → journalctl -f  # Follow logs');
  });
});

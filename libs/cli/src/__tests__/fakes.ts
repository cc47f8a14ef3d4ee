/**
 * In-process stand-ins shared by the CLI specs
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Executor } from '@quicklaunch/core';
import type { Entry, LaunchOutcome, LaunchRequest, ProcessLauncher } from '@quicklaunch/core';
import { UsageStats } from '@quicklaunch/storage';
import type { EntryStore, LoadResult, SaveResult } from '@quicklaunch/storage';
import type { Prompter } from '../prompts';
import { LauncherSession } from '../session';

export const NOW = new Date('2026-05-04T09:30:00.000Z');

export class MemoryEntryStore implements EntryStore {
  readonly location = 'memory://entries';
  saved: Entry[][] = [];
  failWith: string | null = null;

  constructor(private readonly initial: Entry[] = []) {}

  loadAll(): LoadResult {
    return { entries: [...this.initial], warnings: [], seeded: false };
  }

  saveAll(entries: Iterable<Entry>): SaveResult {
    if (this.failWith !== null) return { success: false, error: this.failWith };
    this.saved.push([...entries]);
    return { success: true };
  }

  lastSaved(): string[] {
    return (this.saved[this.saved.length - 1] ?? []).map((e) => e.alias);
  }
}

export class RecordingLauncher implements ProcessLauncher {
  readonly commands: string[] = [];

  constructor(
    private readonly exitCodes: Record<string, number> = {},
    private readonly unstartable: string[] = [],
  ) {}

  async launch(request: LaunchRequest): Promise<LaunchOutcome> {
    this.commands.push(request.command);
    if (this.unstartable.includes(request.command)) {
      throw new Error(`spawn ${request.command} ENOENT`);
    }
    return { exitCode: this.exitCodes[request.command] ?? 0, signal: null };
  }
}

/** Answers questions from a script; null once it runs out. */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];

  constructor(private readonly answers: Array<string | null>) {}

  async ask(question: string): Promise<string | null> {
    this.questions.push(question);
    const next = this.answers.shift();
    return next === undefined ? null : next;
  }
}

export function createTempDir(): { dir: string; cleanup: () => void } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ql-cli-test-'));
  return {
    dir,
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}

export function makeSession(dir: string, store: EntryStore): LauncherSession {
  return new LauncherSession({
    store,
    stats: new UsageStats(path.join(dir, 'stats.json')),
    now: () => NOW,
  });
}

export function makeExecutor(launcher: ProcessLauncher): Executor {
  return new Executor({ launcher, shell: '/bin/sh', cwd: '/work', directoryExists: () => true });
}

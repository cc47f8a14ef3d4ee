// Command execution layer: every entry run passes through this module.
// Executor owns chain semantics (stop at the first failing segment) and the
// dry-run contract (no launcher call at all). ProcessLauncher is the boundary
// to the OS; tests substitute a recording launcher.
import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { splitChain } from './chain.js';
import { inspectCommand } from './safety.js';
import type { SafetyWarning } from './safety.js';
import { noopLogger } from './types.js';
import type { Logger } from './types.js';

export interface LaunchRequest {
  command: string;
  shell: string;
  cwd: string;
  env?: NodeJS.ProcessEnv;
}

export interface LaunchOutcome {
  exitCode: number;
  signal: NodeJS.Signals | null;
}

/** Runs one shell string. Rejects only when the process cannot be started. */
export interface ProcessLauncher {
  launch(request: LaunchRequest): Promise<LaunchOutcome>;
}

function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return 1;
  const num = os.constants.signals[signal];
  return typeof num === 'number' ? 128 + num : 1;
}

/**
 * Launcher backed by child_process.spawn with inherited stdio.
 *
 * While the child runs the launcher ignores SIGINT, so Ctrl+C reaches the
 * child through the terminal and the launcher survives it.
 */
export class ShellLauncher implements ProcessLauncher {
  launch(request: LaunchRequest): Promise<LaunchOutcome> {
    return new Promise<LaunchOutcome>((resolve, reject) => {
      const ignoreInterrupt = (): void => { /* delivered to the child by the terminal */ };
      process.on('SIGINT', ignoreInterrupt);
      const release = (): void => {
        process.removeListener('SIGINT', ignoreInterrupt);
      };

      let child: ChildProcess;
      try {
        child = spawn(request.command, {
          shell: request.shell,
          cwd: request.cwd,
          env: request.env ?? process.env,
          stdio: 'inherit',
        });
      } catch (err) {
        release();
        reject(err);
        return;
      }

      child.once('error', (err) => {
        release();
        reject(err);
      });
      child.once('exit', (code, signal) => {
        release();
        resolve({ exitCode: code ?? signalExitCode(signal), signal });
      });
    });
  }
}

export interface ExecutionPlan {
  command: string;
  chained: boolean;
  segments: string[];
  warnings: SafetyWarning[];
}

export type ExecutionStatus = 'success' | 'failed' | 'spawn-failure' | 'dry-run';

export interface SegmentRun {
  index: number;
  segment: string;
  exitCode: number;
  cwd: string;
}

export interface ExecutionResult {
  status: ExecutionStatus;
  command: string;
  segments: string[];
  segmentsRun: SegmentRun[];
  exitCode: number;
  /** 0-based index of the segment that stopped the chain. */
  firstFailedSegment: number | null;
  warnings: SafetyWarning[];
  error?: string;
}

export interface ExecuteOptions {
  chained: boolean;
  dryRun?: boolean;
  cwd?: string;
}

export interface ExecutorOptions {
  launcher: ProcessLauncher;
  shell: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  directoryExists?: (dir: string) => boolean;
}

// Plain `cd <dir>` only; anything with shell syntax goes to the shell.
const CD_SEGMENT = /^cd(?:\s+([^;&|<>$`()]+))?$/;

function defaultDirectoryExists(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

function unquote(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && (trimmed[0] === '"' || trimmed[0] === "'") && trimmed.endsWith(trimmed[0])) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

/** Exit code reported when the process could not be started. */
export const SPAWN_FAILURE_EXIT_CODE = 127;

export class Executor {
  private readonly launcher: ProcessLauncher;
  private readonly shell: string;
  private readonly cwd: string;
  private readonly env?: NodeJS.ProcessEnv;
  private readonly logger: Logger;
  private readonly directoryExists: (dir: string) => boolean;

  constructor(options: ExecutorOptions) {
    this.launcher = options.launcher;
    this.shell = options.shell;
    this.cwd = options.cwd ?? process.cwd();
    this.env = options.env;
    this.logger = options.logger ?? noopLogger;
    this.directoryExists = options.directoryExists ?? defaultDirectoryExists;
  }

  plan(command: string, chained: boolean): ExecutionPlan {
    const segments = chained ? splitChain(command) : [command.trim()];
    return { command, chained, segments, warnings: inspectCommand(command) };
  }

  async execute(command: string, options: ExecuteOptions): Promise<ExecutionResult> {
    const plan = this.plan(command, options.chained);
    const base = { command, segments: plan.segments, warnings: plan.warnings };

    if (options.dryRun) {
      return { ...base, status: 'dry-run', segmentsRun: [], exitCode: 0, firstFailedSegment: null };
    }

    const runs: SegmentRun[] = [];
    let cwd = options.cwd ?? this.cwd;

    for (let index = 0; index < plan.segments.length; index++) {
      const segment = plan.segments[index];

      const cd = CD_SEGMENT.exec(segment);
      if (cd) {
        const target = this.resolveDirectory(cwd, cd[1]);
        const ok = this.directoryExists(target);
        runs.push({ index, segment, exitCode: ok ? 0 : 1, cwd });
        if (!ok) {
          this.logger.warn(`cd: no such directory: ${target}`);
          return { ...base, status: 'failed', segmentsRun: runs, exitCode: 1, firstFailedSegment: index, error: `cd: no such directory: ${target}` };
        }
        cwd = target;
        continue;
      }

      this.logger.debug(`segment ${index + 1}/${plan.segments.length}: ${segment} (cwd ${cwd})`);

      let exitCode: number;
      try {
        const outcome = await this.launcher.launch({ command: segment, shell: this.shell, cwd, env: this.env });
        exitCode = outcome.exitCode;
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`could not start '${segment}': ${message}`);
        return {
          ...base,
          status: 'spawn-failure',
          segmentsRun: runs,
          exitCode: SPAWN_FAILURE_EXIT_CODE,
          firstFailedSegment: index,
          error: message,
        };
      }

      runs.push({ index, segment, exitCode, cwd });
      if (exitCode !== 0) {
        return { ...base, status: 'failed', segmentsRun: runs, exitCode, firstFailedSegment: index };
      }
    }

    return { ...base, status: 'success', segmentsRun: runs, exitCode: 0, firstFailedSegment: null };
  }

  private resolveDirectory(cwd: string, arg: string | undefined): string {
    if (arg === undefined) return os.homedir();
    const target = unquote(arg);
    if (target === '~') return os.homedir();
    if (target.startsWith('~/')) return path.join(os.homedir(), target.slice(2));
    return path.resolve(cwd, target);
  }
}

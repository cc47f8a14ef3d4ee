/**
 * Interactive loop: `ql`
 *
 * Renders the launcher, runs whatever it hands back with the terminal
 * released, then renders it again with the outcome as a notice.
 */

import React from 'react';
import { render } from 'ink';
import { assertNever, runsAsChain } from '@quicklaunch/core';
import type { ExecutionResult, LauncherError } from '@quicklaunch/core';
import type { CliContext } from './context.js';
import { EXIT_CODES } from './direct.js';
import { color, formatResult } from './output.js';
import { App } from './tui/index.js';
import type { AppProps, LauncherOutcome, NoticeMessage } from './tui/index.js';

/** Render the launcher until it quits or picks a command. */
export function showLauncher(props: Omit<AppProps, 'onOutcome'>): Promise<LauncherOutcome> {
  return new Promise<LauncherOutcome>((resolve, reject) => {
    let outcome: LauncherOutcome = { type: 'quit' };
    const { waitUntilExit } = render(
      React.createElement(App, { ...props, onOutcome: (o: LauncherOutcome) => { outcome = o; } }),
      { exitOnCtrlC: false },
    );
    waitUntilExit().then(() => resolve(outcome), reject);
  });
}

export function loadNotice(warnings: readonly LauncherError[]): NoticeMessage | null {
  if (warnings.length === 0) return null;
  return {
    tone: 'error',
    text: warnings.length === 1 ? '1 problem while loading entries' : `${warnings.length} problems while loading entries`,
    details: warnings.map((w) => w.message),
  };
}

export function resultNotice(alias: string, result: ExecutionResult): NoticeMessage {
  switch (result.status) {
    case 'success':
    case 'dry-run':
      return { tone: 'success', text: `${alias} finished` };
    case 'failed': {
      const step = result.segments.length > 1 && result.firstFailedSegment !== null
        ? ` at step ${result.firstFailedSegment + 1}`
        : '';
      return { tone: 'error', text: `${alias} failed (exit ${result.exitCode})${step}`, details: result.error ? [result.error] : undefined };
    }
    case 'spawn-failure':
      return { tone: 'error', text: `${alias} could not start`, details: result.error ? [result.error] : undefined };
    default:
      return assertNever(result.status);
  }
}

export async function runInteractive(ctx: CliContext): Promise<number> {
  if (!process.stdin.isTTY) {
    console.error(color.red('The launcher needs an interactive terminal. Use `ql <alias>` or `ql list` instead.'));
    return 1;
  }

  const { session, executor, config, prompter, logger } = ctx;
  let notice = loadNotice(session.loadWarnings);

  for (;;) {
    const outcome = await showLauncher({ session, executor, config, notice });
    if (outcome.type === 'quit') return EXIT_CODES.OK;

    const { entry, command } = outcome;
    session.recordRun(entry.alias);
    logger.debug(`running '${entry.alias}': ${command}`);
    console.log(color.gray(`$ ${command}`));

    const result = await executor.execute(command, { chained: runsAsChain(entry.kind, command) });
    for (const line of formatResult(entry.alias, result)) console.log(line);

    const answer = await prompter.ask(color.gray('Press Enter to return to the launcher...'));
    if (answer === null) return result.exitCode;
    notice = resultNotice(entry.alias, result);
  }
}

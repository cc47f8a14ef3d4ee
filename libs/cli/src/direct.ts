/**
 * Direct execution: `ql <alias>`
 */

import { NotFoundError, TemplateResolution, isDestructive, runsAsChain } from '@quicklaunch/core';
import type { Entry, Executor, Logger } from '@quicklaunch/core';
import { color, formatPlan, formatResult, formatWarnings } from './output.js';
import { confirm } from './prompts.js';
import type { Prompter } from './prompts.js';
import type { LauncherSession } from './session.js';

export const EXIT_CODES = {
  OK: 0,
  NOT_FOUND: 2,
  CANCELLED: 130,
} as const;

export interface DirectRunOptions {
  session: LauncherSession;
  executor: Executor;
  prompter: Prompter;
  dryRun?: boolean;
  confirmDestructive: boolean;
  print?: (line: string) => void;
  logger?: Logger;
}

/**
 * Ask for each placeholder on its own line. Returns null when input ends.
 */
export async function promptForTemplate(entry: Entry, prompter: Prompter, print: (line: string) => void): Promise<string | null> {
  if (entry.kind !== 'template') return entry.command;

  const resolution = new TemplateResolution(entry.command, entry.placeholders);
  if (resolution.status === 'collecting') {
    print(color.bold(`Template ${entry.alias}: ${entry.command}`));
  }

  for (let request = resolution.current(); request; request = resolution.current()) {
    if (request.retry) print(color.yellow(`A value for '${request.name}' is required.`));
    const hint = request.default === undefined ? '' : color.gray(` [${request.default}]`);
    const answer = await prompter.ask(`${request.name}${hint}: `);
    if (answer === null) {
      resolution.cancel();
      return null;
    }
    resolution.submit(answer);
  }

  return resolution.result();
}

export async function runDirect(alias: string, options: DirectRunOptions): Promise<number> {
  const { session, executor, prompter } = options;
  const print = options.print ?? ((line: string) => console.log(line));

  const entry = session.get(alias);
  if (!entry) {
    print(color.red(new NotFoundError(alias).message));
    return EXIT_CODES.NOT_FOUND;
  }

  const command = await promptForTemplate(entry, prompter, print);
  if (command === null) {
    print('Cancelled.');
    return EXIT_CODES.CANCELLED;
  }

  const chained = runsAsChain(entry.kind, command);

  if (options.dryRun) {
    for (const line of formatPlan(executor.plan(command, chained))) print(line);
    return EXIT_CODES.OK;
  }

  const plan = executor.plan(command, chained);
  for (const line of formatWarnings(plan.warnings)) print(line);

  if (options.confirmDestructive && isDestructive(command)) {
    print(color.gray(`Command: ${command}`));
    if (!(await confirm(prompter, 'Are you sure you want to run this?'))) {
      print('Cancelled.');
      return EXIT_CODES.CANCELLED;
    }
  }

  session.recordRun(entry.alias);
  options.logger?.debug(`running '${entry.alias}': ${command}`);
  const result = await executor.execute(command, { chained });
  if (result.status !== 'success') {
    for (const line of formatResult(entry.alias, result)) print(line);
  }
  return result.exitCode;
}

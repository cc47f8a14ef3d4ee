#!/usr/bin/env node
/**
 * QuickLaunch CLI
 *
 * Keyboard-driven launcher for saved shell commands, chains and templates.
 *
 * @example
 * ```bash
 * # Browse and run entries
 * ql
 *
 * # Run one entry directly
 * ql deploy
 *
 * # Save a command
 * ql add logs "journalctl -f" -d "Follow the system log"
 * ```
 */

import { Command } from 'commander';
import {
  createAddCommand,
  createEditCommand,
  createExportCommand,
  createImportCommand,
  createListCommand,
  createRemoveCommand,
  createStatsCommand,
} from './commands/index.js';
import { createContext } from './context.js';
import { runDirect } from './direct.js';
import { runInteractive } from './interactive.js';
import { VERSION } from './version.js';

/**
 * Create and configure the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('ql')
    .description('QuickLaunch - run saved commands, chains and templates')
    .version(VERSION, '-V, --version', 'Output the version number')
    .argument('[alias]', 'Entry to run without opening the launcher')
    .option('--dry-run', 'Show what would run without running it')
    .addHelpText(
      'after',
      `
Examples:
  $ ql                                   Open the launcher
  $ ql deploy                            Run an entry directly
  $ ql deploy --dry-run                  Show what deploy would run
  $ ql add logs "journalctl -f"          Save a command
  $ ql chain ship "git pull && make"     Save a chain
  $ ql template clone "git clone {repo}" Save a template
  $ ql stats                             Most used entries
`
    )
    .action(async (alias: string | undefined, options: { dryRun?: boolean }) => {
      const ctx = createContext();
      process.exitCode = alias === undefined
        ? await runInteractive(ctx)
        : await runDirect(alias, {
          session: ctx.session,
          executor: ctx.executor,
          prompter: ctx.prompter,
          dryRun: options.dryRun,
          confirmDestructive: ctx.config.confirmDestructive,
          logger: ctx.logger,
        });
    });

  // Register commands
  program.addCommand(createAddCommand('link'));
  program.addCommand(createAddCommand('chain'));
  program.addCommand(createAddCommand('template'));
  program.addCommand(createEditCommand());
  program.addCommand(createRemoveCommand());
  program.addCommand(createListCommand());
  program.addCommand(createStatsCommand());
  program.addCommand(createExportCommand());
  program.addCommand(createImportCommand());

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    console.error('Error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});

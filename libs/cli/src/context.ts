/**
 * Wiring shared by every command: config, logger, store, session, executor
 */

import { Executor, ShellLauncher } from '@quicklaunch/core';
import type { Logger } from '@quicklaunch/core';
import { JsonEntryStore, UsageStats } from '@quicklaunch/storage';
import { loadConfig } from './config.js';
import type { QuickLaunchConfig } from './config.js';
import { createLogger } from './logger.js';
import { ReadlinePrompter } from './prompts.js';
import type { Prompter } from './prompts.js';
import { LauncherSession } from './session.js';

export interface CliContext {
  config: QuickLaunchConfig;
  logger: Logger;
  session: LauncherSession;
  executor: Executor;
  prompter: Prompter;
}

export function createContext(env: NodeJS.ProcessEnv = process.env): CliContext {
  const { config, warnings } = loadConfig(env);
  const logger = createLogger(config.logLevel);
  for (const warning of warnings) logger.warn(warning);

  const store = new JsonEntryStore({
    filePath: config.paths.entriesFile,
    seedDefaults: config.seedDefaults,
    logger,
  });
  const stats = new UsageStats(config.paths.statsFile, logger);
  const session = new LauncherSession({
    store,
    stats,
    logger,
    navigation: { previewVisible: config.preview },
  });

  const executor = new Executor({
    launcher: new ShellLauncher(),
    shell: config.shell,
    logger,
  });

  return { config, logger, session, executor, prompter: new ReadlinePrompter() };
}

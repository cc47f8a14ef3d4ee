/**
 * QuickLaunch CLI Library
 *
 * Configuration, session wiring and the command creators behind `ql`.
 *
 * @packageDocumentation
 */

export { VERSION } from './version.js';

export { loadConfig, DEFAULT_SHELL, DEFAULT_LIST_HEIGHT } from './config.js';
export type { QuickLaunchConfig, ConfigResult } from './config.js';
export { createLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export type { LogLevel } from './logger.js';
export { LauncherSession, RESERVED_ALIASES } from './session.js';
export type { LauncherSessionOptions, AddOptions } from './session.js';
export { createContext } from './context.js';
export type { CliContext } from './context.js';
export { runDirect, promptForTemplate, EXIT_CODES } from './direct.js';
export type { DirectRunOptions } from './direct.js';
export { runInteractive, showLauncher } from './interactive.js';

// Re-export command creators (for extending the CLI)
export * from './commands/index.js';

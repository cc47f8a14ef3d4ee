/**
 * Configuration loader
 *
 * Built-in defaults, then `config.json` in the data directory, then the
 * environment. A bad config file is reported and ignored.
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { defaultDataDir, resolveDataPaths } from '@quicklaunch/storage';
import type { DataPaths } from '@quicklaunch/storage';
import { LOG_LEVELS, isLogLevel } from './logger.js';
import type { LogLevel } from './logger.js';

export const ConfigFileSchema = z.object({
  shell: z.string().min(1).optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
  preview: z.boolean().optional(),
  listHeight: z.number().int().min(3).max(50).optional(),
  confirmDestructive: z.boolean().optional(),
  seedDefaults: z.boolean().optional(),
});
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface QuickLaunchConfig {
  paths: DataPaths;
  shell: string;
  logLevel: LogLevel;
  /** Preview pane visible when the launcher opens. */
  preview: boolean;
  /** Rows in the entry window. */
  listHeight: number;
  /** Ask before running a command that matches a destructive signature. */
  confirmDestructive: boolean;
  seedDefaults: boolean;
}

export interface ConfigResult {
  config: QuickLaunchConfig;
  warnings: string[];
}

export const DEFAULT_SHELL = '/bin/sh';
export const DEFAULT_LIST_HEIGHT = 10;

type ReadFile = (filePath: string) => string;

const readUtf8: ReadFile = (filePath) => fs.readFileSync(filePath, 'utf-8');

function readConfigFile(filePath: string, readFile: ReadFile, warnings: string[]): ConfigFile {
  let raw: string;
  try {
    raw = readFile(filePath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
    warnings.push(`could not read ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    warnings.push(`ignoring ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    return {};
  }

  const parsed = ConfigFileSchema.safeParse(data);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`).join('; ');
    warnings.push(`ignoring ${filePath}: ${detail}`);
    return {};
  }
  return parsed.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, readFile: ReadFile = readUtf8): ConfigResult {
  const warnings: string[] = [];
  const paths = resolveDataPaths(env.QL_HOME || defaultDataDir());
  const file = readConfigFile(paths.configFile, readFile, warnings);

  let logLevel: LogLevel = file.logLevel ?? 'warn';
  const envLevel = env.QL_LOG_LEVEL;
  if (envLevel) {
    if (isLogLevel(envLevel)) {
      logLevel = envLevel;
    } else {
      warnings.push(`unknown QL_LOG_LEVEL '${envLevel}', expected one of ${LOG_LEVELS.join(', ')}`);
    }
  }

  return {
    config: {
      paths,
      shell: env.QL_SHELL || file.shell || env.SHELL || DEFAULT_SHELL,
      logLevel,
      preview: file.preview ?? true,
      listHeight: file.listHeight ?? DEFAULT_LIST_HEIGHT,
      confirmDestructive: file.confirmDestructive ?? true,
      seedDefaults: env.QL_NO_SEED === '1' ? false : file.seedDefaults ?? true,
    },
    warnings,
  };
}

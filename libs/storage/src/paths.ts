/**
 * Data directory layout
 */

import * as os from 'node:os';
import * as path from 'node:path';
import { CONFIG_FILENAME, DATA_DIRNAME, ENTRIES_FILENAME, STATS_FILENAME } from './constants.js';

export interface DataPaths {
  home: string;
  entriesFile: string;
  statsFile: string;
  configFile: string;
}

export function defaultDataDir(): string {
  return path.join(os.homedir(), DATA_DIRNAME);
}

export function resolveDataPaths(home: string = defaultDataDir()): DataPaths {
  const dir = path.resolve(home);
  return {
    home: dir,
    entriesFile: path.join(dir, ENTRIES_FILENAME),
    statsFile: path.join(dir, STATS_FILENAME),
    configFile: path.join(dir, CONFIG_FILENAME),
  };
}

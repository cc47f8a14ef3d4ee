/**
 * Storage constants
 */

export const ENTRIES_FILENAME = 'entries.json';
export const STATS_FILENAME = 'stats.json';
export const CONFIG_FILENAME = 'config.json';

/** Default data directory name under the home directory. */
export const DATA_DIRNAME = '.quicklaunch';

export const STORE_VERSION = 1;

/** Version string written into export files. */
export const EXPORT_VERSION = '1.0.0';

export const FILE_PERMISSIONS = {
  DATA_FILE: 0o600,
  DATA_DIR: 0o700,
} as const;

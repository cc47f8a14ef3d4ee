/**
 * Storage error types
 */

import { LauncherError } from '@quicklaunch/core';

export class StoreWriteError extends LauncherError {
  public readonly filePath: string;

  constructor(filePath: string, detail: string) {
    super(`Could not write ${filePath}: ${detail}`, 'STORE_WRITE_FAILED');
    this.name = 'StoreWriteError';
    this.filePath = filePath;
  }
}

export class ImportFormatError extends LauncherError {
  public readonly filePath: string;

  constructor(filePath: string, detail: string) {
    super(`Cannot import ${filePath}: ${detail}`, 'IMPORT_FORMAT');
    this.name = 'ImportFormatError';
    this.filePath = filePath;
  }
}

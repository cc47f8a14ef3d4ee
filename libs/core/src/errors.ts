/**
 * Typed error classes for quicklaunch
 */

export class LauncherError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'LauncherError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class StoreCorruptError extends LauncherError {
  public readonly filePath: string;

  constructor(filePath: string, detail: string) {
    super(`Entry store ${filePath} is unreadable: ${detail}`, 'STORE_CORRUPT');
    this.name = 'StoreCorruptError';
    this.filePath = filePath;
  }
}

export class MissingValueError extends LauncherError {
  public readonly placeholders: string[];

  constructor(placeholders: string[]) {
    super(`Missing value for placeholder(s): ${placeholders.join(', ')}`, 'MISSING_VALUE');
    this.name = 'MissingValueError';
    this.placeholders = placeholders;
  }
}

export class EntryValidationError extends LauncherError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message, 'INVALID_ENTRY');
    this.name = 'EntryValidationError';
    this.field = field;
  }
}

export class DuplicateAliasError extends LauncherError {
  public readonly alias: string;

  constructor(alias: string) {
    super(`Entry '${alias}' already exists`, 'DUPLICATE_ALIAS');
    this.name = 'DuplicateAliasError';
    this.alias = alias;
  }
}

export class NotFoundError extends LauncherError {
  public readonly alias: string;

  constructor(alias: string) {
    super(`Entry '${alias}' not found`, 'NOT_FOUND');
    this.name = 'NotFoundError';
    this.alias = alias;
  }
}

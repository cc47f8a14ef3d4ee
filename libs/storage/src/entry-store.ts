/**
 * JSON entry store
 *
 * The whole collection is one document, read once at launch and rewritten
 * after every mutation. Loading never throws: problems come back as warnings
 * and the caller continues with whatever could be read.
 */

import * as fs from 'node:fs';
import { LauncherError, StoreCorruptError, noopLogger, toRecord } from '@quicklaunch/core';
import type { Entry, Logger, StoreDocument } from '@quicklaunch/core';
import { writeJsonAtomic } from './atomic-write.js';
import { STORE_VERSION } from './constants.js';
import { defaultEntries } from './defaults.js';
import { StoreWriteError } from './errors.js';
import { decodeDocument } from './records.js';

export interface LoadResult {
  entries: Entry[];
  warnings: LauncherError[];
  /** True when the store did not exist and default templates were written. */
  seeded: boolean;
}

export interface SaveResult {
  success: boolean;
  error?: string;
}

export interface EntryStore {
  /** Where the collection lives, for messages. */
  readonly location: string;
  loadAll(): LoadResult;
  saveAll(entries: Iterable<Entry>): SaveResult;
}

export interface JsonEntryStoreOptions {
  filePath: string;
  /** Write the default templates when the file does not exist yet. */
  seedDefaults?: boolean;
  logger?: Logger;
  now?: () => Date;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class JsonEntryStore implements EntryStore {
  readonly filePath: string;
  readonly location: string;
  private readonly seedDefaults: boolean;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: JsonEntryStoreOptions) {
    this.filePath = options.filePath;
    this.location = options.filePath;
    this.seedDefaults = options.seedDefaults ?? true;
    this.logger = options.logger ?? noopLogger;
    this.now = options.now ?? (() => new Date());
  }

  loadAll(): LoadResult {
    let content: string;
    try {
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return this.seed();
      return this.corrupt(errorMessage(err), false);
    }

    const decoded = decodeDocument(content, this.now().toISOString());
    if (decoded.fatal !== null) {
      return this.corrupt(decoded.fatal, true);
    }

    const warnings = decoded.skipped.map((detail) => new StoreCorruptError(this.filePath, `skipped ${detail}`));
    for (const w of warnings) this.logger.warn(w.message);
    this.logger.debug(`loaded ${decoded.entries.length} entries from ${this.filePath}`);
    return { entries: decoded.entries, warnings, seeded: false };
  }

  saveAll(entries: Iterable<Entry>): SaveResult {
    const doc: StoreDocument = {
      version: STORE_VERSION,
      entries: [...entries].map(toRecord),
    };
    try {
      writeJsonAtomic(this.filePath, doc);
      return { success: true };
    } catch (err) {
      const detail = errorMessage(err);
      this.logger.error(new StoreWriteError(this.filePath, detail).message);
      return { success: false, error: detail };
    }
  }

  private seed(): LoadResult {
    if (!this.seedDefaults) return { entries: [], warnings: [], seeded: false };

    const entries = defaultEntries(this.now());
    const saved = this.saveAll(entries);
    if (!saved.success) {
      return { entries, warnings: [new StoreWriteError(this.filePath, saved.error ?? 'unknown error')], seeded: false };
    }
    this.logger.info(`created ${this.filePath} with ${entries.length} default templates`);
    return { entries, warnings: [], seeded: true };
  }

  /**
   * An unreadable document is copied aside before the caller gets a chance
   * to overwrite it with an empty collection.
   */
  private corrupt(detail: string, keepCopy: boolean): LoadResult {
    const warnings: LauncherError[] = [new StoreCorruptError(this.filePath, detail)];
    if (keepCopy) {
      const backup = `${this.filePath}.corrupt`;
      try {
        fs.copyFileSync(this.filePath, backup);
        this.logger.warn(`kept a copy of the unreadable store at ${backup}`);
      } catch (err) {
        warnings.push(new StoreWriteError(backup, errorMessage(err)));
      }
    }
    for (const w of warnings) this.logger.warn(w.message);
    return { entries: [], warnings, seeded: false };
  }
}

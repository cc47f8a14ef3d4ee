/**
 * quicklaunch storage
 *
 * JSON entry store, usage statistics, default templates and export/import.
 *
 * @packageDocumentation
 */

// Constants and layout
export { ENTRIES_FILENAME, STATS_FILENAME, CONFIG_FILENAME, DATA_DIRNAME, STORE_VERSION, EXPORT_VERSION } from './constants.js';
export { defaultDataDir, resolveDataPaths } from './paths.js';
export type { DataPaths } from './paths.js';

// Errors
export { StoreWriteError, ImportFormatError } from './errors.js';

// Entry store
export { JsonEntryStore } from './entry-store.js';
export type { EntryStore, JsonEntryStoreOptions, LoadResult, SaveResult } from './entry-store.js';
export { decodeDocument, parseLines, recordCandidate } from './records.js';
export type { DecodeResult } from './records.js';
export { DEFAULT_TEMPLATES, defaultEntries } from './defaults.js';
export { writeFileAtomic, writeJsonAtomic } from './atomic-write.js';

// Statistics
export { UsageStats } from './stats.js';
export type { StatsDocument, UsageSummary } from './stats.js';

// Export / import
export { buildExport, writeExport, readImport, findConflicts, mergeImported } from './transfer.js';
export type { ExportDocument, ImportResult, MergeResult } from './transfer.js';

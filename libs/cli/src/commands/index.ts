/**
 * CLI Commands
 *
 * Exports all command creator functions for registration in the main CLI.
 */

export { createAddCommand, reviewCommand } from './add.js';
export { createEditCommand, collectEdit } from './edit.js';
export { createRemoveCommand } from './remove.js';
export { createListCommand } from './list.js';
export { createStatsCommand, statsHeadline } from './stats.js';
export { createExportCommand, createImportCommand } from './transfer.js';

/**
 * quicklaunch core
 *
 * Entry model, fuzzy matcher, template resolver, navigation engine and
 * executor. No terminal or storage concerns live here.
 *
 * @packageDocumentation
 */

export * from './types.js';
export * from './errors.js';
export * from './schemas.js';
export * from './chain.js';
export * from './entries.js';
export * from './matcher.js';
export * from './template.js';
export * from './safety.js';
export * from './navigation.js';
export * from './view-model.js';
export * from './executor.js';

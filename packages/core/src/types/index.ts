/**
 * Type Exports
 */

export * from './rule-match.js';
export * from './analysis.js';
export * from './bitext.js';
export * from './activation.js';
export * from './profiling.js';
export * from './check.js';

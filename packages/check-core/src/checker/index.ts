/**
 * Checker Module Exports
 */

export { TextChecker } from './text-checker.js';
export type { TextCheckerOptions, CheckTextOptions } from './text-checker.js';
export { BitextChecker } from './bitext-checker.js';
export type { BitextCheckerOptions } from './bitext-checker.js';

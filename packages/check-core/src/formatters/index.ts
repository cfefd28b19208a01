/**
 * Formatter Exports
 */

export { buildPlainTextContext, DEFAULT_CONTEXT_SIZE } from './context.js';
export { formatMatches, formatTimeStats } from './match-formatter.js';
export type { FormatMatchesOptions } from './match-formatter.js';
export { formatProfileReport } from './profile-formatter.js';

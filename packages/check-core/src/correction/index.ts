/**
 * Correction Module Exports
 */

export { applyCorrections, correctTextFromMatches } from './correction-applier.js';
export type { CorrectionResult } from './correction-applier.js';

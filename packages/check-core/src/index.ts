/**
 * @proofmark/check-core
 *
 * Reconciles rule matches reported by an analysis engine: aggregation of
 * monolingual and bitext matches, position adjustment, correction, rule
 * activation and profiling.
 */

// Aggregation
export { MatchAggregator } from './aggregation/index.js';

// Positions
export {
  shiftLines,
  adjustMatchPosition,
  shiftFromStreamingPosition,
  adjustToStreamingPosition,
  SentencePositionTracker,
} from './positions/index.js';

// Correction
export { applyCorrections, correctTextFromMatches } from './correction/index.js';
export type { CorrectionResult } from './correction/index.js';

// Activation
export {
  defaultActiveRules,
  resolveActiveRules,
  findUnknownRuleIds,
  selectActiveRules,
} from './activation/index.js';

// Profiling
export { median, RuleProfiler, summarizeSample, DEFAULT_PROFILE_RUNS } from './profiling/index.js';
export type { RuleProfilerOptions } from './profiling/index.js';

// Bitext rules
export { BitextRuleRegistry, loadBitextRules } from './bitext-rules/index.js';
export type {
  BitextRuleConfig,
  BitextRuleContext,
  BitextRuleFactory,
  LoadBitextRulesOptions,
} from './bitext-rules/index.js';

// Resources
export { loadMessageBundle, formatMessage } from './resources/index.js';

// Checkers
export { TextChecker, BitextChecker } from './checker/index.js';
export type {
  TextCheckerOptions,
  CheckTextOptions,
  BitextCheckerOptions,
} from './checker/index.js';

// Formatters
export {
  buildPlainTextContext,
  DEFAULT_CONTEXT_SIZE,
  formatMatches,
  formatTimeStats,
  formatProfileReport,
} from './formatters/index.js';
export type { FormatMatchesOptions } from './formatters/index.js';

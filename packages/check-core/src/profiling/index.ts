/**
 * Profiling Module Exports
 */

export { median } from './median.js';
export { RuleProfiler, summarizeSample, DEFAULT_PROFILE_RUNS } from './rule-profiler.js';
export type { RuleProfilerOptions } from './rule-profiler.js';

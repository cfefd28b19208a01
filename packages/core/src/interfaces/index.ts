/**
 * Interface Exports
 */

export type { Rule, BitextRule } from './rule.js';
export type { IAnalysisEngine } from './analysis-engine.js';
export type { IBitextReader } from './bitext-reader.js';
export type { IBitextRuleSource } from './bitext-rule-source.js';
export type { ICheckLogger } from './logger.js';

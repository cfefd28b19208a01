/**
 * Bitext Rules Module Exports
 */

export { BitextRuleRegistry } from './bitext-rule-registry.js';
export type { BitextRuleConfig, BitextRuleContext, BitextRuleFactory } from './bitext-rule-registry.js';
export { loadBitextRules } from './bitext-rule-loader.js';
export type { LoadBitextRulesOptions } from './bitext-rule-loader.js';

/**
 * Bitext Rule Loader
 *
 * Collects the bitext rules for a language pair: declarative rules from each
 * source (pattern files, false friends) followed by the built-in rules.
 */

import type { BitextRule, IBitextRuleSource } from '@proofmark/core';
import { CheckError } from '@proofmark/core';
import type { BitextRuleConfig, BitextRuleRegistry } from './bitext-rule-registry.js';

export interface LoadBitextRulesOptions {
  config: BitextRuleConfig;
  sources?: readonly IBitextRuleSource[];
  registry?: BitextRuleRegistry;
}

/**
 * Load all bitext rules, or none.
 *
 * Resource errors from a source propagate unchanged; any other failure is
 * reported as BITEXT_RULES_LOAD_FAILED.
 */
export function loadBitextRules(options: LoadBitextRulesOptions): BitextRule[] {
  const { config, sources = [], registry } = options;
  const rules: BitextRule[] = [];

  for (const source of sources) {
    try {
      rules.push(...source.load(config.sourceLanguage, config.targetLanguage));
    } catch (error) {
      if (error instanceof CheckError) {
        throw error;
      }
      throw new CheckError({
        code: 'BITEXT_RULES_LOAD_FAILED',
        message: `Failed to load bitext rules from ${source.name}`,
        cause: error instanceof Error ? error : new Error(String(error)),
        context: {
          source: source.name,
          sourceLanguage: config.sourceLanguage.code,
          targetLanguage: config.targetLanguage.code,
        },
      });
    }
  }

  if (registry) {
    rules.push(...registry.createAll(config));
  }

  return rules;
}

/**
 * Analysis Engine Interface
 *
 * The tokenizer, tagger and rule matcher of one language. Proofmark never
 * implements these; it only reconciles what the engine reports.
 */

import type { AnalyzedSentence, LanguageInfo, RuleMatch } from '../types/index.js';
import type { Rule } from './rule.js';

export interface IAnalysisEngine {
  readonly language: LanguageInfo;

  /**
   * Split a text into sentences.
   *
   * Each returned sentence must occur in the text in order; whitespace
   * between sentences may be kept or dropped.
   */
  tokenizeSentences(text: string): string[];

  /**
   * Tokenize, tag and disambiguate one sentence.
   */
  analyze(sentence: string): AnalyzedSentence;

  /**
   * Run the given rules over one analyzed sentence.
   *
   * @returns matches in the engine's native order, relative to the sentence
   */
  matchAll(sentence: AnalyzedSentence, rules: readonly Rule[]): RuleMatch[];

  /**
   * Every rule the engine knows, including default-off rules.
   */
  getAllRules(): readonly Rule[];
}

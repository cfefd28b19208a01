/**
 * Rule Interfaces
 */

import type { AnalyzedSentence, RuleMatch } from '../types/index.js';

/**
 * A monolingual rule run by the analysis engine.
 */
export interface Rule {
  readonly id: string;
  /** Rules that stay off unless explicitly enabled */
  readonly defaultOff?: boolean;
  readonly url?: string;
  /**
   * Match the rule against one sentence.
   *
   * @returns matches with positions relative to the sentence
   */
  match(sentence: AnalyzedSentence): readonly RuleMatch[];
}

/**
 * A rule comparing an aligned source sentence and target sentence.
 */
export interface BitextRule {
  readonly id: string;
  /**
   * @returns matches relative to the target sentence, or NO_MATCHES
   */
  match(source: AnalyzedSentence, target: AnalyzedSentence): readonly RuleMatch[];
}

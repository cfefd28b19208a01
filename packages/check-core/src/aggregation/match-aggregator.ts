/**
 * Match Aggregator
 *
 * Merges monolingual and bilingual rule matches for one aligned pair.
 */

import type {
  AnalyzedSentence,
  BitextRule,
  IAnalysisEngine,
  Rule,
  RuleMatch,
} from '@proofmark/core';
import { validateRuleMatch } from '@proofmark/core';

export class MatchAggregator {
  constructor(private readonly targetEngine: IAnalysisEngine) {}

  /**
   * Matches of the active target rules in engine order, followed by the
   * matches of each bitext rule in list order.
   *
   * Nothing is deduplicated or sorted; callers needing document order sort
   * explicitly. Every match is validated, so a malformed plugin match raises
   * INVALID_MATCH here.
   */
  aggregate(
    source: AnalyzedSentence,
    target: AnalyzedSentence,
    activeRules: readonly Rule[],
    bitextRules: readonly BitextRule[]
  ): RuleMatch[] {
    const matches = this.targetEngine
      .matchAll(target, activeRules)
      .map((match) => validateRuleMatch(match));

    for (const rule of bitextRules) {
      for (const match of rule.match(source, target)) {
        matches.push(validateRuleMatch(match));
      }
    }

    return matches;
  }
}

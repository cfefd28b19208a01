/**
 * Correction Applier
 *
 * Applies the first suggestion of every match to the text it was computed
 * against, without rewriting spans an earlier correction already changed.
 */

import type { RuleMatch } from '@proofmark/core';
import { hasSuggestions } from '@proofmark/core';

export interface CorrectionResult {
  text: string;
  /** Matches whose first suggestion was applied */
  applied: number;
  /** Matches with suggestions skipped because their span had already changed */
  skipped: number;
}

/**
 * Apply suggestions and report how many were applied or skipped.
 *
 * Precondition: matches are in ascending, non-overlapping position order.
 * Other orders produce a result that depends on list order; sort first with
 * `sortMatchesByPosition` when in doubt. Matches without suggestions are
 * ignored.
 */
export function correctTextFromMatches(
  originalText: string,
  matches: readonly RuleMatch[]
): CorrectionResult {
  const withSuggestions = matches.filter(hasSuggestions);
  const expected = withSuggestions.map((m) => originalText.slice(m.fromPos, m.toPos));

  let text = originalText;
  let offset = 0;
  let applied = 0;

  withSuggestions.forEach((match, index) => {
    const from = match.fromPos - offset;
    const to = match.toPos - offset;
    if (from < 0 || to > text.length || text.slice(from, to) !== expected[index]) {
      return;
    }

    const replacement = match.suggestedReplacements[0] ?? '';
    text = text.slice(0, from) + replacement + text.slice(to);
    offset += match.toPos - match.fromPos - replacement.length;
    applied++;
  });

  return {
    text,
    applied,
    skipped: withSuggestions.length - applied,
  };
}

/**
 * Apply suggestions to a text. Returns the text unchanged when there is
 * nothing to apply.
 */
export function applyCorrections(originalText: string, matches: readonly RuleMatch[]): string {
  if (matches.length === 0) {
    return originalText;
  }
  return correctTextFromMatches(originalText, matches).text;
}

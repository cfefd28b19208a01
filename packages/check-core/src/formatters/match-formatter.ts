/**
 * Match Report Formatter
 *
 * Formats matches as the numbered plain-text report of the command line.
 */

import type { RuleMatch } from '@proofmark/core';
import { buildPlainTextContext, DEFAULT_CONTEXT_SIZE } from './context.js';

export interface FormatMatchesOptions {
  /** Number of matches already reported before these */
  startIndex?: number;
  /** Characters of context on each side (default: 45) */
  contextSize?: number;
  /** Document offset at which `text` starts, for matches from a streamed line */
  textOffset?: number;
}

/**
 * Format matches, one block per match separated by a blank line.
 */
export function formatMatches(
  matches: readonly RuleMatch[],
  text: string,
  options: FormatMatchesOptions = {}
): string {
  const { startIndex = 0, contextSize = DEFAULT_CONTEXT_SIZE, textOffset = 0 } = options;

  return matches
    .map((match, i) => formatMatch(match, startIndex + i + 1, text, contextSize, textOffset))
    .join('\n\n');
}

function formatMatch(
  match: RuleMatch,
  number: number,
  text: string,
  contextSize: number,
  textOffset: number
): string {
  const ruleId = match.subId ? `${match.ruleId}[${match.subId}]` : match.ruleId;
  const lines = [
    `${number}.) Line ${match.line + 1}, column ${match.column + 1}, Rule ID: ${ruleId}`,
    `Message: ${match.message.replace(/<\/?suggestion>/g, "'")}`,
  ];

  if (match.suggestedReplacements.length > 0) {
    lines.push(`Suggestion: ${match.suggestedReplacements.join('; ')}`);
  }

  lines.push(
    buildPlainTextContext(match.fromPos - textOffset, match.toPos - textOffset, text, contextSize)
  );

  if (match.url) {
    lines.push(`More info: ${match.url}`);
  }

  return lines.join('\n');
}

/**
 * One-line timing summary of a check.
 */
export function formatTimeStats(elapsedMs: number, sentenceCount: number): string {
  let rate = 0;
  if (sentenceCount > 0) {
    rate = elapsedMs === 0 ? Number.POSITIVE_INFINITY : sentenceCount / (elapsedMs / 1000);
  }
  return `Time: ${elapsedMs}ms for ${sentenceCount} sentences (${rate.toFixed(1)} sentences/sec)`;
}

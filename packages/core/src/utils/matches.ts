/**
 * Rule match utilities
 */

import type { RuleMatch } from '../types/index.js';
import { CheckError } from '../errors/index.js';
import { ruleMatchSchema } from '../validation/index.js';

/**
 * The distinguished "no match" result of a bitext rule
 */
export const NO_MATCHES: readonly RuleMatch[] = Object.freeze([]);

export interface RuleMatchInit {
  ruleId: string;
  subId?: string;
  fromPos: number;
  toPos: number;
  message: string;
  shortMessage?: string;
  suggestedReplacements?: readonly string[];
  url?: string;
}

/**
 * Line and column (both 0-based) of an offset in a text
 */
export function lineAndColumnAt(text: string, offset: number): { line: number; column: number } {
  let line = 0;
  let lineStart = 0;
  const end = Math.min(offset, text.length);
  for (let i = 0; i < end; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: offset - lineStart };
}

/**
 * Create a match whose line and column fields are derived from the text it
 * was found in.
 */
export function createRuleMatch(text: string, init: RuleMatchInit): RuleMatch {
  const start = lineAndColumnAt(text, init.fromPos);
  const end = lineAndColumnAt(text, init.toPos);

  return validateRuleMatch({
    ruleId: init.ruleId,
    subId: init.subId,
    fromPos: init.fromPos,
    toPos: init.toPos,
    line: start.line,
    endLine: end.line,
    column: start.column,
    endColumn: end.column,
    message: init.message,
    shortMessage: init.shortMessage,
    suggestedReplacements: [...(init.suggestedReplacements ?? [])],
    url: init.url,
  });
}

/**
 * Validate a match received from outside the process boundary of the checker
 * (plugins, JSON input).
 */
export function validateRuleMatch(value: unknown): RuleMatch {
  const result = ruleMatchSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length ? issue.path.join('.') : '(root)';
    throw new CheckError({
      code: 'INVALID_MATCH',
      message: `Invalid rule match at ${path}: ${issue?.message ?? 'unknown issue'}`,
      suggestion: 'Check the analysis engine plugin that produced this match.',
      context: { value },
    });
  }

  const data = result.data;
  // Drop absent optionals so matches compare equal regardless of origin.
  const match: RuleMatch = {
    ruleId: data.ruleId,
    fromPos: data.fromPos,
    toPos: data.toPos,
    line: data.line,
    endLine: data.endLine,
    column: data.column,
    endColumn: data.endColumn,
    message: data.message,
    suggestedReplacements: data.suggestedReplacements,
    ...(data.subId !== undefined ? { subId: data.subId } : {}),
    ...(data.shortMessage !== undefined ? { shortMessage: data.shortMessage } : {}),
    ...(data.url !== undefined ? { url: data.url } : {}),
  };
  return match;
}

export function hasSuggestions(match: RuleMatch): boolean {
  return match.suggestedReplacements.length > 0;
}

/**
 * Order matches by start offset, then end offset. Stable for equal spans.
 *
 * Corrections require ascending input; call this before applying matches
 * collected out of document order.
 */
export function sortMatchesByPosition(matches: readonly RuleMatch[]): RuleMatch[] {
  return [...matches].sort((a, b) => a.fromPos - b.fromPos || a.toPos - b.toPos);
}

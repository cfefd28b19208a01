/**
 * Rule Match Types
 *
 * A rule match is a single flagged span of text produced by the analysis
 * engine, carrying a diagnostic message and optional fix suggestions.
 */

/**
 * A flagged span in a text.
 *
 * Offsets are half-open UTF-16 positions into the text the match was computed
 * against. Lines and columns are 0-based; they are sentence-local when the
 * match leaves the matcher and document-global once adjusted.
 */
export interface RuleMatch {
  /** Id of the rule that produced the match */
  readonly ruleId: string;
  /** Sub-rule id for rules grouped under one id */
  readonly subId?: string;
  /** Start offset (inclusive) */
  readonly fromPos: number;
  /** End offset (exclusive), never smaller than fromPos */
  readonly toPos: number;
  readonly line: number;
  readonly endLine: number;
  readonly column: number;
  readonly endColumn: number;
  /** Message shown to the user, may contain <suggestion> markup */
  readonly message: string;
  readonly shortMessage?: string;
  /** Ordered fixes; only the first one is ever applied automatically */
  readonly suggestedReplacements: readonly string[];
  /** Link to a description of the rule */
  readonly url?: string;
}

/**
 * Shift applied to a sentence-local match to place it in a larger text
 */
export interface PositionShift {
  /** Added to fromPos and toPos */
  charOffset: number;
  /** Added to column (and endColumn) only on the first local line */
  columnOffset: number;
  /** Added to line and endLine */
  lineOffset: number;
}

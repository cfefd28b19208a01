/**
 * Check Result Types
 */

import type { RuleMatch } from './rule-match.js';
import type { StreamingPosition } from './bitext.js';

/**
 * Result of checking a text or a bitext stream
 */
export interface CheckReport {
  /** Matches in document coordinates */
  matches: RuleMatch[];
  /** Number of sentences (or aligned pairs) checked */
  sentenceCount: number;
  /** Wall-clock duration of the check */
  elapsedMs: number;
}

/**
 * Matches of one aligned pair, lifted to document coordinates
 */
export interface PairCheckResult {
  /** 0-based index of the pair in the stream */
  index: number;
  source: string;
  target: string;
  matches: RuleMatch[];
  /** Snapshot the matches were adjusted with */
  position: StreamingPosition;
}

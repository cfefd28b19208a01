/**
 * Bitext Types
 *
 * Types for aligned source/target sentence pairs read from a parallel corpus.
 */

/**
 * One source sentence paired with its target-language translation
 */
export interface AlignedPair {
  readonly source: string;
  readonly target: string;
}

/**
 * Running counters of a bitext reader, read after each pair is yielded.
 *
 * Values never decrease across successive reads within one document.
 */
export interface StreamingPosition {
  /** Document offset at which the current target sentence starts */
  readonly sentenceByteOffset: number;
  /** Column at which the current target sentence starts */
  readonly columnCount: number;
  /** 0-based line of the current target sentence */
  readonly lineCount: number;
  /** Full text of the line the current pair was read from */
  readonly currentLineText: string;
  /** Document offset at which currentLineText starts */
  readonly lineStartOffset?: number;
}

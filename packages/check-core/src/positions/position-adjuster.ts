/**
 * Position Adjuster
 *
 * Lifts matches computed against a sentence into the coordinates of the
 * document the sentence came from.
 */

import type { PositionShift, RuleMatch, StreamingPosition } from '@proofmark/core';

/**
 * Add a flat line offset to line and endLine. Offsets and columns are kept.
 */
export function shiftLines(matches: readonly RuleMatch[], lineOffset = 0): RuleMatch[] {
  if (lineOffset === 0) {
    return [...matches];
  }
  return matches.map((match) => ({
    ...match,
    line: match.line + lineOffset,
    endLine: match.endLine + lineOffset,
  }));
}

/**
 * Translate one sentence-local match.
 *
 * Columns restart at every line break, so the column offset only applies to
 * positions on the first local line.
 */
export function adjustMatchPosition(match: RuleMatch, shift: PositionShift): RuleMatch {
  return {
    ...match,
    fromPos: match.fromPos + shift.charOffset,
    toPos: match.toPos + shift.charOffset,
    line: match.line + shift.lineOffset,
    endLine: match.endLine + shift.lineOffset,
    column: match.line === 0 ? match.column + shift.columnOffset : match.column,
    endColumn: match.endLine === 0 ? match.endColumn + shift.columnOffset : match.endColumn,
  };
}

/**
 * Shift described by a reader snapshot taken right after a pair was read.
 */
export function shiftFromStreamingPosition(position: StreamingPosition): PositionShift {
  return {
    charOffset: position.sentenceByteOffset,
    columnOffset: position.columnCount,
    lineOffset: position.lineCount,
  };
}

/**
 * Translate the matches of one aligned pair to document-global coordinates.
 */
export function adjustToStreamingPosition(
  matches: readonly RuleMatch[],
  position: StreamingPosition
): RuleMatch[] {
  const shift = shiftFromStreamingPosition(position);
  return matches.map((match) => adjustMatchPosition(match, shift));
}

/**
 * Tracks line and column while walking forward through a text, so each
 * sentence start can be turned into a shift without rescanning the prefix.
 */
export class SentencePositionTracker {
  private scanned = 0;
  private line = 0;
  private lineStart = 0;

  constructor(private readonly text: string) {}

  /**
   * Shift for a sentence starting at `offset`. Offsets must not decrease
   * between calls.
   */
  shiftAt(offset: number): PositionShift {
    if (offset < this.scanned) {
      throw new RangeError(`Sentence offset ${offset} is behind ${this.scanned}`);
    }
    for (let i = this.scanned; i < offset; i++) {
      if (this.text.charCodeAt(i) === 10) {
        this.line++;
        this.lineStart = i + 1;
      }
    }
    this.scanned = offset;

    return {
      charOffset: offset,
      columnOffset: offset - this.lineStart,
      lineOffset: this.line,
    };
  }
}

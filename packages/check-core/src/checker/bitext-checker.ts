/**
 * Bitext Checker
 *
 * Checks aligned source/target pairs: the target language rules run on the
 * target sentence, then each bitext rule compares the pair. Readers are
 * consumed one pair at a time.
 */

import type {
  ActiveRuleSet,
  BitextRule,
  CheckReport,
  IAnalysisEngine,
  IBitextReader,
  ICheckLogger,
  PairCheckResult,
  RuleActivationRequest,
  RuleMatch,
} from '@proofmark/core';
import {
  defaultActiveRules,
  resolveActiveRules,
  selectActiveRules,
} from '../activation/index.js';
import { MatchAggregator } from '../aggregation/index.js';
import { correctTextFromMatches } from '../correction/index.js';
import {
  adjustMatchPosition,
  adjustToStreamingPosition,
  shiftLines,
} from '../positions/index.js';

export interface BitextCheckerOptions {
  /** Target rules to run (default: every target rule not flagged default-off) */
  activeRuleIds?: ActiveRuleSet;
  /** Millisecond clock (default: Date.now) */
  clock?: () => number;
  logger?: ICheckLogger;
}

export class BitextChecker {
  readonly activeRuleIds: ActiveRuleSet;
  private readonly aggregator: MatchAggregator;
  private readonly clock: () => number;

  constructor(
    private readonly sourceEngine: IAnalysisEngine,
    private readonly targetEngine: IAnalysisEngine,
    private readonly bitextRules: readonly BitextRule[],
    private readonly options: BitextCheckerOptions = {}
  ) {
    this.activeRuleIds =
      options.activeRuleIds ?? defaultActiveRules(targetEngine.getAllRules());
    this.aggregator = new MatchAggregator(targetEngine);
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Return a checker running the target rules selected by the request.
   * Bitext rules are not affected.
   */
  selectRules(request: RuleActivationRequest): BitextChecker {
    return new BitextChecker(this.sourceEngine, this.targetEngine, this.bitextRules, {
      ...this.options,
      activeRuleIds: resolveActiveRules(this.activeRuleIds, request),
    });
  }

  /**
   * Check a single pair.
   *
   * Positions stay relative to the target sentence, which always starts at
   * line 0, column 0, whatever was checked before.
   */
  checkPair(source: string, target: string, lineOffset = 0): RuleMatch[] {
    const matches = this.aggregator.aggregate(
      this.sourceEngine.analyze(source),
      this.targetEngine.analyze(target),
      selectActiveRules(this.targetEngine.getAllRules(), this.activeRuleIds),
      this.bitextRules
    );
    return shiftLines(matches, lineOffset);
  }

  /**
   * Check every pair of a reader, yielding matches in document coordinates as
   * each pair is read.
   */
  *streamMatches(reader: IBitextReader): Generator<PairCheckResult> {
    let index = 0;
    for (const pair of reader) {
      const position = reader.getPosition();
      const matches = adjustToStreamingPosition(
        this.checkPair(pair.source, pair.target),
        position
      );
      yield {
        index,
        source: pair.source,
        target: pair.target,
        matches,
        position,
      };
      index++;
    }
  }

  /**
   * Check a whole reader and collect the matches.
   */
  checkReader(reader: IBitextReader): CheckReport {
    const startTime = this.clock();
    const matches: RuleMatch[] = [];
    let sentenceCount = 0;

    for (const result of this.streamMatches(reader)) {
      matches.push(...result.matches);
      sentenceCount++;
    }

    this.options.logger?.debug('Checked bitext', {
      pairs: sentenceCount,
      matches: matches.length,
      bitextRules: this.bitextRules.length,
    });

    return {
      matches,
      sentenceCount,
      elapsedMs: this.clock() - startTime,
    };
  }

  /**
   * Yield the corrected target of every pair, or the target unchanged when
   * nothing matched.
   */
  *correctPairs(reader: IBitextReader): Generator<string> {
    for (const pair of reader) {
      const position = reader.getPosition();
      // Offsets stay relative to the target string being corrected.
      const shift = {
        charOffset: 0,
        columnOffset: position.columnCount,
        lineOffset: position.lineCount,
      };
      const matches = this.checkPair(pair.source, pair.target).map((match) =>
        adjustMatchPosition(match, shift)
      );

      if (matches.length === 0) {
        yield pair.target;
        continue;
      }

      const result = correctTextFromMatches(pair.target, matches);
      if (result.skipped > 0) {
        this.options.logger?.debug('Skipped overlapping corrections', {
          line: position.lineCount,
          applied: result.applied,
          skipped: result.skipped,
        });
      }
      yield result.text;
    }
  }
}

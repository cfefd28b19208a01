/**
 * Rule Profiler
 *
 * Times each active rule over a corpus to find the rules that take most time.
 */

import type {
  IAnalysisEngine,
  ProfileEntry,
  ProfileReport,
  ProfileSample,
  Rule,
} from '@proofmark/core';
import { CheckError } from '@proofmark/core';
import { median } from './median.js';

/** Number of timed runs per rule */
export const DEFAULT_PROFILE_RUNS = 10;

export interface RuleProfilerOptions {
  /** Timed runs per rule (default: 10) */
  runs?: number;
  /** Millisecond clock (default: Date.now) */
  clock?: () => number;
}

export class RuleProfiler {
  private readonly runs: number;
  private readonly clock: () => number;

  constructor(
    private readonly engine: IAnalysisEngine,
    options: RuleProfilerOptions = {}
  ) {
    const runs = options.runs ?? DEFAULT_PROFILE_RUNS;
    if (!Number.isInteger(runs) || runs < 1) {
      throw new CheckError({
        code: 'INVALID_OPTIONS',
        message: `Profile runs must be a positive integer (got ${runs})`,
      });
    }
    this.runs = runs;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Profile every given rule over the sentences of a text.
   *
   * Sentences are analyzed inside the timed loop, as a real check would.
   */
  profileRulesOnText(text: string, rules: readonly Rule[]): ProfileReport {
    const sentences = this.engine.tokenizeSentences(text);

    return {
      ruleCount: rules.length,
      sentenceCount: sentences.length,
      entries: rules.map((rule) => summarizeSample(this.sample(rule, sentences))),
    };
  }

  /**
   * Count the matches of one rule over a text without timing.
   */
  profileRulesOnLine(text: string, rule: Rule): number {
    let count = 0;
    for (const sentence of this.engine.tokenizeSentences(text)) {
      count += rule.match(this.engine.analyze(sentence)).length;
    }
    return count;
  }

  /**
   * Time one rule over pre-split sentences.
   */
  sample(rule: Rule, sentences: readonly string[]): ProfileSample {
    const perRunMillis: number[] = [];
    let matchCount = 0;

    for (let run = 0; run < this.runs; run++) {
      const startTime = this.clock();
      for (const sentence of sentences) {
        matchCount += rule.match(this.engine.analyze(sentence)).length;
      }
      perRunMillis.push(this.clock() - startTime);
    }

    return {
      ruleId: rule.id,
      perRunMillis,
      matchCount,
      sentenceCount: sentences.length,
    };
  }
}

/**
 * Reduce a sample to its median time and throughput.
 *
 * The match count stays the sum over all runs.
 */
export function summarizeSample(sample: ProfileSample): ProfileEntry {
  const medianMillis = median(sample.perRunMillis);

  let sentencesPerSecond = 0;
  if (sample.sentenceCount > 0) {
    sentencesPerSecond =
      medianMillis === 0 ? Number.POSITIVE_INFINITY : sample.sentenceCount / (medianMillis / 1000);
  }

  return {
    ruleId: sample.ruleId,
    medianMillis,
    sentenceCount: sample.sentenceCount,
    matchCount: sample.matchCount,
    sentencesPerSecond,
  };
}

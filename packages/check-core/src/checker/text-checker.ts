/**
 * Text Checker
 *
 * Checks and corrects monolingual text with one analysis engine and an
 * immutable set of active rules.
 */

import type {
  ActiveRuleSet,
  AnalyzedSentence,
  CheckReport,
  IAnalysisEngine,
  ICheckLogger,
  ProfileReport,
  Rule,
  RuleActivationRequest,
  RuleMatch,
} from '@proofmark/core';
import { CheckError, validateRuleMatch } from '@proofmark/core';
import {
  defaultActiveRules,
  resolveActiveRules,
  selectActiveRules,
} from '../activation/index.js';
import { correctTextFromMatches } from '../correction/index.js';
import { adjustMatchPosition, shiftLines, SentencePositionTracker } from '../positions/index.js';
import { RuleProfiler } from '../profiling/index.js';

export interface TextCheckerOptions {
  /** Rules to run (default: every rule not flagged default-off) */
  activeRuleIds?: ActiveRuleSet;
  /** Timed runs per rule when profiling (default: 10) */
  profileRuns?: number;
  /** Millisecond clock (default: Date.now) */
  clock?: () => number;
  logger?: ICheckLogger;
}

export interface CheckTextOptions {
  /** Added to line and endLine of every match */
  lineOffset?: number;
}

export class TextChecker {
  readonly activeRuleIds: ActiveRuleSet;
  private readonly clock: () => number;

  constructor(
    private readonly engine: IAnalysisEngine,
    private readonly options: TextCheckerOptions = {}
  ) {
    this.activeRuleIds = options.activeRuleIds ?? defaultActiveRules(engine.getAllRules());
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Registered rules that will run, in engine order.
   */
  get activeRules(): Rule[] {
    return selectActiveRules(this.engine.getAllRules(), this.activeRuleIds);
  }

  /**
   * Return a checker running the rules selected by the request.
   */
  selectRules(request: RuleActivationRequest): TextChecker {
    return new TextChecker(this.engine, {
      ...this.options,
      activeRuleIds: resolveActiveRules(this.activeRuleIds, request),
    });
  }

  /**
   * Check a text sentence by sentence and return matches in document
   * coordinates.
   */
  checkText(text: string, options: CheckTextOptions = {}): CheckReport {
    const startTime = this.clock();
    const rules = this.activeRules;
    const sentences = this.engine.tokenizeSentences(text);
    const tracker = new SentencePositionTracker(text);
    const matches: RuleMatch[] = [];

    let cursor = 0;
    for (const sentence of sentences) {
      const start = text.indexOf(sentence, cursor);
      if (start === -1) {
        throw new CheckError({
          code: 'SENTENCE_ALIGNMENT_FAILED',
          message: `Sentence not found in the checked text after offset ${cursor}`,
          suggestion: 'The engine tokenizer must return sentences exactly as they occur in the text.',
          context: { sentence: sentence.slice(0, 80), offset: cursor },
        });
      }

      const shift = tracker.shiftAt(start);
      for (const match of this.engine.matchAll(this.engine.analyze(sentence), rules)) {
        matches.push(adjustMatchPosition(validateRuleMatch(match), shift));
      }
      cursor = start + sentence.length;
    }

    const report: CheckReport = {
      matches: shiftLines(matches, options.lineOffset ?? 0),
      sentenceCount: sentences.length,
      elapsedMs: this.clock() - startTime,
    };

    this.options.logger?.debug('Checked text', {
      sentences: report.sentenceCount,
      matches: report.matches.length,
      rules: rules.length,
    });

    return report;
  }

  /**
   * Check a text and apply the first suggestion of every match.
   */
  correctText(text: string): string {
    const { matches } = this.checkText(text);
    if (matches.length === 0) {
      return text;
    }

    const result = correctTextFromMatches(text, matches);
    if (result.skipped > 0) {
      this.options.logger?.debug('Skipped overlapping corrections', {
        applied: result.applied,
        skipped: result.skipped,
      });
    }
    return result.text;
  }

  /**
   * Analyze every sentence of a text without running rules.
   */
  tagText(text: string): AnalyzedSentence[] {
    return this.engine.tokenizeSentences(text).map((sentence) => this.engine.analyze(sentence));
  }

  /**
   * Time every active rule over the sentences of a text.
   */
  profileRulesOnText(text: string): ProfileReport {
    return this.createProfiler().profileRulesOnText(text, this.activeRules);
  }

  /**
   * Count the matches of one rule over a text.
   */
  profileRulesOnLine(text: string, rule: Rule | string): number {
    return this.createProfiler().profileRulesOnLine(text, this.resolveRule(rule));
  }

  private createProfiler(): RuleProfiler {
    return new RuleProfiler(this.engine, {
      runs: this.options.profileRuns,
      clock: this.clock,
    });
  }

  private resolveRule(rule: Rule | string): Rule {
    if (typeof rule !== 'string') {
      return rule;
    }

    const found = this.engine.getAllRules().find((r) => r.id === rule);
    if (!found) {
      throw new CheckError({
        code: 'UNKNOWN_RULE',
        message: `Rule '${rule}' is not registered for ${this.engine.language.code}`,
        suggestion: 'Check the rule id against the engine rule list.',
      });
    }
    return found;
  }
}

/**
 * Runner
 *
 * Runs one job over an input: check, correct, profile or tag a text, or check
 * and correct a tab-separated bitext corpus. Reports go to the output sink,
 * diagnostics to the logger.
 */

import { z } from 'zod';
import type { AnalyzedSentence, IAnalysisEngine, RuleActivationRequest } from '@proofmark/core';
import { toActivationRequest } from '@proofmark/core';
import {
  BitextChecker,
  BitextRuleRegistry,
  findUnknownRuleIds,
  formatMatches,
  formatProfileReport,
  formatTimeStats,
  loadBitextRules,
  loadMessageBundle,
  TextChecker,
} from '@proofmark/check-core';
import { TabBitextReader } from '@proofmark/bitext-reader';
import { ConfigError } from './config.js';
import type { ConfigFile } from './config.js';
import type { EngineModule } from './engine-loader.js';
import type { Logger } from './logger.js';

export const runModeSchema = z.enum([
  'check',
  'correct',
  'profile',
  'tag',
  'bitext-check',
  'bitext-correct',
]);

export type RunMode = z.infer<typeof runModeSchema>;

export interface RunInput {
  /** File name used in messages */
  name: string;
  content: string;
}

export interface RunOverrides {
  lineOffset?: number;
}

export interface RunnerOptions {
  config: ConfigFile;
  engineModule: EngineModule;
  logger: Logger;
  /** Receives report text (default: stdout) */
  output?: (chunk: string) => void;
  clock?: () => number;
}

export class Runner {
  private readonly output: (chunk: string) => void;

  constructor(private readonly options: RunnerOptions) {
    this.output = options.output ?? ((chunk) => process.stdout.write(chunk));
  }

  async run(mode: RunMode, input: RunInput, overrides: RunOverrides = {}): Promise<void> {
    const logger = this.options.logger.child({ mode, input: input.name });
    logger.debug('Starting run');

    switch (mode) {
      case 'check':
      case 'correct':
      case 'profile':
      case 'tag':
        await this.runText(mode, input, overrides);
        return;
      case 'bitext-check':
      case 'bitext-correct':
        await this.runBitext(mode, input);
        return;
      default: {
        const exhaustive: never = mode;
        throw new ConfigError(`Unsupported mode: ${String(exhaustive)}`);
      }
    }
  }

  private async runText(
    mode: 'check' | 'correct' | 'profile' | 'tag',
    input: RunInput,
    overrides: RunOverrides
  ): Promise<void> {
    const { config, engineModule, logger, clock } = this.options;
    const engine = await engineModule.createEngine(config.engine.language, config.engine.options);
    const request = this.activationRequest(engine);

    const checker = new TextChecker(engine, {
      profileRuns: config.profile.runs,
      clock,
      logger,
    }).selectRules(request);

    switch (mode) {
      case 'check': {
        const report = checker.checkText(input.content, {
          lineOffset: overrides.lineOffset ?? config.check.lineOffset,
        });
        this.writeReport(
          formatMatches(report.matches, input.content, { contextSize: config.check.contextSize }),
          formatTimeStats(report.elapsedMs, report.sentenceCount)
        );
        return;
      }
      case 'correct':
        this.output(checker.correctText(input.content));
        return;
      case 'profile':
        this.output(formatProfileReport(checker.profileRulesOnText(input.content)));
        return;
      case 'tag':
        this.writeReport(...checker.tagText(input.content).map(formatAnalyzedSentence));
        return;
    }
  }

  private async runBitext(mode: 'bitext-check' | 'bitext-correct', input: RunInput): Promise<void> {
    const { config, engineModule, logger, clock } = this.options;
    if (!config.bitext) {
      throw new ConfigError(`Mode ${mode} needs a "bitext" section in the config file`);
    }

    const options = config.engine.options;
    const sourceEngine = await engineModule.createEngine(config.bitext.sourceLanguage, options);
    const targetEngine = await engineModule.createEngine(config.bitext.targetLanguage, options);
    const messages = config.bitext.messages ? await loadMessageBundle(config.bitext.messages) : {};

    const registry = new BitextRuleRegistry();
    engineModule.registerBitextRules(registry);
    const bitextRules = loadBitextRules({
      config: {
        messages,
        sourceLanguage: sourceEngine.language,
        targetLanguage: targetEngine.language,
      },
      sources: engineModule.bitextRuleSources(sourceEngine.language, targetEngine.language),
      registry,
    });
    logger.debug('Loaded bitext rules', { count: bitextRules.length });

    const checker = new BitextChecker(sourceEngine, targetEngine, bitextRules, {
      clock,
      logger,
    }).selectRules(this.activationRequest(targetEngine));
    const reader = new TabBitextReader(input.content, { name: input.name });

    if (mode === 'bitext-check') {
      this.streamBitextReport(checker, reader);
      return;
    }

    for (const corrected of checker.correctPairs(reader)) {
      this.output(`${corrected}\n`);
    }
  }

  /**
   * Report each pair's matches as soon as it is checked, with context taken
   * from the corpus line the pair came from.
   */
  private streamBitextReport(checker: BitextChecker, reader: TabBitextReader): void {
    const clock = this.options.clock ?? Date.now;
    const startTime = clock();
    let reported = 0;
    let pairs = 0;

    for (const { matches, position } of checker.streamMatches(reader)) {
      pairs++;
      if (matches.length === 0) {
        continue;
      }

      const report = formatMatches(matches, position.currentLineText, {
        startIndex: reported,
        contextSize: this.options.config.check.contextSize,
        textOffset: position.lineStartOffset ?? position.sentenceByteOffset - position.columnCount,
      });
      this.output(`${report}\n\n`);
      reported += matches.length;
    }

    this.output(`${formatTimeStats(clock() - startTime, pairs)}\n`);
  }

  private activationRequest(engine: IAnalysisEngine): RuleActivationRequest {
    const request = toActivationRequest(this.options.config.rules);
    const unknown = findUnknownRuleIds(request, engine.getAllRules());
    if (unknown.length > 0) {
      this.options.logger.warn('Rule selection names unknown rule ids', {
        language: engine.language.code,
        ruleIds: unknown,
      });
    }
    return request;
  }

  private writeReport(...sections: string[]): void {
    const text = sections.filter((section) => section !== '').join('\n\n');
    this.output(`${text}\n`);
  }
}

function formatAnalyzedSentence(sentence: AnalyzedSentence): string {
  return sentence.tokens
    .map((token) => {
      const tags = [token.lemma, token.posTag].filter((tag) => tag !== undefined);
      return tags.length > 0 ? `${token.token}[${tags.join('/')}]` : token.token;
    })
    .join(' ');
}

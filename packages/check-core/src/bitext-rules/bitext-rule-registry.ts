/**
 * Bitext Rule Registry
 *
 * Explicit factories for built-in bitext rules. Every factory takes the same
 * typed configuration, so a rule that cannot be built fails at registration
 * type-check rather than while loading.
 */

import type { BitextRule, LanguageInfo, MessageBundle } from '@proofmark/core';
import { CheckError, wrapError } from '@proofmark/core';
import { formatMessage } from '../resources/index.js';

export interface BitextRuleConfig {
  messages: MessageBundle;
  sourceLanguage: LanguageInfo;
  targetLanguage: LanguageInfo;
}

/**
 * What a factory receives: the shared config plus a message lookup bound to
 * its bundle.
 */
export interface BitextRuleContext extends BitextRuleConfig {
  /** Message for a key with `{0}`-style placeholders filled, or the key itself */
  message(key: string, ...args: Array<string | number>): string;
}

export type BitextRuleFactory = (context: BitextRuleContext) => BitextRule;

export class BitextRuleRegistry {
  private factories = new Map<string, BitextRuleFactory>();

  /**
   * Register a factory under the id of the rule it builds
   */
  register(id: string, factory: BitextRuleFactory): this {
    if (this.factories.has(id)) {
      throw new CheckError({
        code: 'DUPLICATE_RULE',
        message: `Bitext rule '${id}' is already registered`,
        suggestion: 'Use a unique id for each bitext rule.',
      });
    }

    this.factories.set(id, factory);
    return this;
  }

  has(id: string): boolean {
    return this.factories.has(id);
  }

  listIds(): string[] {
    return Array.from(this.factories.keys());
  }

  get size(): number {
    return this.factories.size;
  }

  /**
   * Build every registered rule, in registration order.
   *
   * One failing factory fails the whole set.
   */
  createAll(config: BitextRuleConfig): BitextRule[] {
    const rules: BitextRule[] = [];
    const context: BitextRuleContext = {
      ...config,
      message: (key, ...args) => formatMessage(config.messages, key, ...args),
    };

    for (const [id, factory] of this.factories) {
      let rule: BitextRule;
      try {
        rule = factory(context);
      } catch (error) {
        throw new CheckError({
          code: 'BITEXT_RULES_LOAD_FAILED',
          message: `Failed to create bitext rule '${id}'`,
          cause: wrapError(error),
          context: { ruleId: id },
        });
      }

      if (rule.id !== id) {
        throw new CheckError({
          code: 'BITEXT_RULES_LOAD_FAILED',
          message: `Factory registered as '${id}' built rule '${rule.id}'`,
          suggestion: 'Register each factory under the id of the rule it creates.',
          context: { ruleId: id },
        });
      }

      rules.push(rule);
    }

    return rules;
  }
}

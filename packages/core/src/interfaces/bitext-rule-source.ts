/**
 * Bitext Rule Source Interface
 *
 * Loaders of declarative bitext rules (pattern rules, false friends).
 */

import type { LanguageInfo } from '../types/index.js';
import type { BitextRule } from './rule.js';

export interface IBitextRuleSource {
  /** Name used in error messages, e.g. the rule file */
  readonly name: string;
  load(source: LanguageInfo, target: LanguageInfo): BitextRule[];
}

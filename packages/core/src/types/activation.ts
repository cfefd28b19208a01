/**
 * Rule Activation Types
 */

/** Ids of the rules that run during a check */
export type ActiveRuleSet = ReadonlySet<string>;

/**
 * Request to change which rules are active.
 *
 * Ids present in both sets end up enabled.
 */
export interface RuleActivationRequest {
  readonly disabledIds: ReadonlySet<string>;
  readonly enabledIds: ReadonlySet<string>;
  /** When set and enabledIds is non-empty, every other rule is switched off */
  readonly exclusiveEnable: boolean;
}

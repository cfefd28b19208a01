/**
 * Rule Activation Resolver
 *
 * Computes which rules run from a disable list, an enable list and the
 * exclusive-enable flag. The active set is immutable; callers swap in the
 * returned set.
 */

import type { ActiveRuleSet, Rule, RuleActivationRequest } from '@proofmark/core';

/**
 * Ids of the rules that run when nothing was selected: every rule not flagged
 * default-off.
 */
export function defaultActiveRules(rules: readonly Rule[]): Set<string> {
  return new Set(rules.filter((rule) => !rule.defaultOff).map((rule) => rule.id));
}

/**
 * Resolve a new active set.
 *
 * Steps run in a fixed order: disable, then enable, then the exclusive
 * filter. An id both disabled and enabled therefore ends up enabled, and
 * enabling also switches on default-off rules.
 */
export function resolveActiveRules(
  current: ActiveRuleSet,
  request: RuleActivationRequest
): Set<string> {
  const next = new Set(current);

  for (const id of request.disabledIds) {
    next.delete(id);
  }

  if (request.enabledIds.size > 0) {
    for (const id of request.enabledIds) {
      next.add(id);
    }

    if (request.exclusiveEnable) {
      for (const id of [...next]) {
        if (!request.enabledIds.has(id)) {
          next.delete(id);
        }
      }
    }
  }

  return next;
}

/**
 * Requested ids that no registered rule carries.
 */
export function findUnknownRuleIds(
  request: RuleActivationRequest,
  rules: readonly Rule[]
): string[] {
  const known = new Set(rules.map((rule) => rule.id));
  const requested = new Set([...request.disabledIds, ...request.enabledIds]);
  return [...requested].filter((id) => !known.has(id)).sort();
}

/**
 * Registered rules that are active, in registry order.
 */
export function selectActiveRules<R extends { readonly id: string }>(
  rules: readonly R[],
  active: ActiveRuleSet
): R[] {
  return rules.filter((rule) => active.has(rule.id));
}

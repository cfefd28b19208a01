/**
 * Rule activation helpers
 */

import type { RuleActivationRequest } from '../types/index.js';
import type { RuleSelection } from '../validation/index.js';

export function createActivationRequest(
  disabledIds: Iterable<string> = [],
  enabledIds: Iterable<string> = [],
  exclusiveEnable = true
): RuleActivationRequest {
  return {
    disabledIds: new Set(disabledIds),
    enabledIds: new Set(enabledIds),
    exclusiveEnable,
  };
}

/**
 * Convert a parsed rule selection (config file form) into an activation request
 */
export function toActivationRequest(selection: RuleSelection): RuleActivationRequest {
  return createActivationRequest(selection.disable, selection.enable, selection.enabledOnly);
}

/**
 * Activation Module Exports
 */

export {
  defaultActiveRules,
  resolveActiveRules,
  findUnknownRuleIds,
  selectActiveRules,
} from './rule-activation.js';

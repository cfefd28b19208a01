export {
  NO_MATCHES,
  lineAndColumnAt,
  createRuleMatch,
  validateRuleMatch,
  hasSuggestions,
  sortMatchesByPosition,
} from './matches.js';
export type { RuleMatchInit } from './matches.js';
export { createActivationRequest, toActivationRequest } from './activation.js';

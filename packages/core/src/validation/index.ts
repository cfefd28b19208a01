export {
  ruleMatchSchema,
  ruleSelectionSchema,
  messageBundleSchema,
} from './schemas.js';
export type { RuleSelection, MessageBundle } from './schemas.js';

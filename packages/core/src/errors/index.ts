export { CheckError, wrapError } from './check-error.js';
export type { CheckErrorCode, CheckErrorDetails } from './check-error.js';

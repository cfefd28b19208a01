/**
 * @proofmark/core
 *
 * Data model, collaborator interfaces and shared utilities for proofmark
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';

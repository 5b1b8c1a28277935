/**
 * Utility exports for @drover/core
 */

// ID utilities
export { generatePrefixedId } from './id.js';

// Schema validation utilities
export {
  toValidationErrors,
  formatValidationErrors,
  nonEmptyString,
  httpUrl,
} from './schema.js';
export type { ValidationError } from './schema.js';

// Error utilities
export { formatError } from './error-helpers.js';

// Timers
export { sleep } from './time.js';

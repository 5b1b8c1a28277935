/**
 * @drover/core
 *
 * Core types, errors, configuration and utilities for the Drover browser session manager.
 */

// Types
export * from './types/index.js';

// Schemas (task validation)
export * from './schemas/index.js';

// Errors
export {
  DroverError,
  Errors,
  isDroverError,
  toDroverError,
  ERROR_HTTP_STATUS,
} from './errors.js';
export type { ErrorCode } from './errors.js';

// Configuration
export * from './config/index.js';

// Logging
export { createLogger, componentLogger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';

// Extraction
export {
  refineValues,
  filterFallbackValues,
  toExtractedValue,
  extractField,
  extractAll,
} from './extraction/refine.js';
export type { SelectorReader } from './extraction/refine.js';

// Task presets
export {
  buildAutocompleteTask,
  DEFAULT_SUGGESTION_SELECTORS,
  DEFAULT_SEARCH_INPUT_SELECTOR,
} from './tasks/autocomplete.js';
export type { AutocompleteTaskOptions } from './tasks/autocomplete.js';

// Utilities
export * from './utils/index.js';

// Constants
export {
  DEFAULT_TIMEOUTS,
  MAX_RETRIES,
  DRIVER_POOL,
  BROWSER,
  CHROME_ARGS,
  CHROME_BINARY_PATHS,
  ID_PREFIX,
} from './constants.js';

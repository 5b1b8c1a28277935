/**
 * Schema exports for @drover/core
 */

export {
  ActionSchema,
  FieldExtractionSchema,
  ExtractionSpecSchema,
  TaskInputSchema,
  createTask,
} from './task.js';

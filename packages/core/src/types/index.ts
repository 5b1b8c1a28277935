/**
 * Type exports for @drover/core
 */

// Outcomes
export type { Outcome } from './common.js';
export { ok, fail } from './common.js';

// Tasks
export type {
  WaitUntil,
  NavigateAction,
  WaitForSelectorAction,
  ClickAction,
  FillAction,
  TypeAction,
  PressAction,
  WaitAction,
  Action,
  ActionType,
  ExtractionFallback,
  FieldExtraction,
  ExtractionSpec,
  ExtractedValue,
  ExtractedData,
  Task,
  TaskInput,
  TaskDefaults,
} from './task.js';

// Results
export type { ExecutionMetadata, TaskResult } from './result.js';

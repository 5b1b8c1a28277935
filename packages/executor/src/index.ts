/**
 * @drover/executor
 *
 * Task execution with crash retry for Drover.
 */

// Types
export type {
  LeaseProvider,
  AttemptRecord,
  ExecutorConfig,
  ExecutorOptions,
  ExecutorEventType,
  ExecutorEvent,
  ExecutorEventHandler,
  ExecutorStats,
} from './types.js';

export { DEFAULT_EXECUTOR_CONFIG } from './types.js';

// Executor
export { TaskExecutor, createTaskExecutor } from './executor.js';

/**
 * Session Manager Types
 */

import type { ErrorCode, Logger } from '@drover/core';
import type { ExecutorStats, TaskExecutor } from '@drover/executor';
import type { DriverFactory, PoolStatus } from '@drover/session-pool';

/**
 * Manager lifecycle state
 */
export type ManagerState =
  | 'starting'  // Constructed, warming up
  | 'ready'     // Accepting tasks
  | 'draining'  // Shutting down, waiting for in-flight tasks
  | 'stopped';  // Pool closed

/**
 * Classification of a submission's outcome, for logs and counters
 */
export type OutcomeClass =
  | 'success'
  | 'timeout'
  | 'action_failed'
  | 'crashed'
  | 'exhausted'
  | 'closed'
  | 'launch_failed'
  | 'invalid'
  | 'not_ready'
  | 'error';

/**
 * Outcome class of each error code
 */
export const OUTCOME_CLASS_BY_CODE: Record<ErrorCode, OutcomeClass> = {
  POOL_EXHAUSTED: 'exhausted',
  POOL_CLOSED: 'closed',
  DRIVER_CRASHED: 'crashed',
  DRIVER_TIMEOUT: 'timeout',
  DRIVER_LAUNCH_FAILED: 'launch_failed',
  ACTION_FAILED: 'action_failed',
  NOT_READY: 'not_ready',
  INVALID_TASK: 'invalid',
  CONFIGURATION_ERROR: 'error',
  INTERNAL_ERROR: 'error',
};

/**
 * Session manager configuration
 */
export interface SessionManagerConfig {
  /** Task budget when the task does not set one */
  defaultTimeoutMs: number;
  /** Crash retries when the task does not set them */
  defaultMaxRetries: number;
  /** Bounded wait for in-flight tasks on shutdown */
  drainTimeoutMs: number;
  /** Drivers launched by start() */
  warmupCount: number;
}

export interface SessionManagerOptions {
  /** Executor to delegate to; one is created when omitted */
  executor?: TaskExecutor;
  logger?: Logger;
}

/**
 * Options of the composition root
 */
export interface CreateSessionManagerOptions {
  /** Driver factory; Playwright with system Chrome when omitted */
  driverFactory?: DriverFactory;
  logger?: Logger;
}

/**
 * Health report for external monitoring
 */
export interface HealthReport {
  state: ManagerState;
  /** Whether submit() currently accepts tasks */
  ready: boolean;
  /** Tasks being executed */
  inFlight: number;
  /** Time since start() completed, 0 before */
  uptimeMs: number;
  /** Submissions by outcome */
  submissions: Record<OutcomeClass, number>;
  executor: ExecutorStats;
  pool: PoolStatus;
}

/**
 * Session manager event types
 */
export type ManagerEventType = 'state_changed' | 'task_finished';

/**
 * Session manager event
 */
export interface ManagerEvent {
  type: ManagerEventType;
  timestamp: Date;
  /** Task ID, for task events that got past validation */
  taskId?: string;
  details: Record<string, unknown>;
}

export type ManagerEventHandler = (event: ManagerEvent) => void;

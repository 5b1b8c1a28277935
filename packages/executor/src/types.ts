/**
 * Executor Types
 *
 * Types for task execution, attempts and executor events.
 */

import type { ErrorCode, Logger } from '@drover/core';
import type { Lease, ReleaseOptions } from '@drover/session-pool';

/**
 * What the executor needs from a pool
 */
export interface LeaseProvider {
  lease(timeoutMs?: number): Promise<Lease>;
  release(lease: Lease, options?: ReleaseOptions): boolean;
}

/**
 * Record of one attempt
 */
export interface AttemptRecord {
  /** Attempt index, starting at 0 */
  attempt: number;
  /** Driver used, when one was leased */
  handleId?: string;
  /** 'success' or the error code */
  outcome: 'success' | ErrorCode;
  durationMs: number;
  /** Error message on failure */
  error?: string;
}

/**
 * Executor configuration
 */
export interface ExecutorConfig {
  /** Lease wait per attempt; the pool's default when unset */
  leaseTimeoutMs?: number;
}

export interface ExecutorOptions {
  logger?: Logger;
}

/**
 * Default executor configuration
 */
export const DEFAULT_EXECUTOR_CONFIG: ExecutorConfig = {};

/**
 * Executor event types
 */
export type ExecutorEventType =
  | 'attempt_started'
  | 'attempt_failed'
  | 'task_retry'
  | 'task_completed'
  | 'task_failed';

/**
 * Executor event
 */
export interface ExecutorEvent {
  /** Event type */
  type: ExecutorEventType;
  /** Timestamp */
  timestamp: Date;
  /** Task ID */
  taskId: string;
  /** Attempt index */
  attempt: number;
  /** Driver involved, when known */
  handleId?: string;
  /** Event details */
  details: Record<string, unknown>;
}

/**
 * Executor event handler
 */
export type ExecutorEventHandler = (event: ExecutorEvent) => void;

/**
 * Executor statistics
 */
export interface ExecutorStats {
  /** Tasks currently running */
  executing: number;
  /** Total tasks completed */
  totalCompleted: number;
  /** Total tasks failed */
  totalFailed: number;
  /** Attempts made across all tasks */
  totalAttempts: number;
  /** Crash retries consumed */
  totalRetries: number;
  /** Failed tasks by error code */
  failuresByCode: Partial<Record<ErrorCode, number>>;
  /** Average task duration in ms */
  avgDurationMs: number;
  /** Success rate (0-1) */
  successRate: number;
}

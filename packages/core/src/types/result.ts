/**
 * Result types
 */

import type { ExtractedData } from './task.js';

/**
 * Execution metadata attached to every successful result
 */
export interface ExecutionMetadata {
  /** Wall time across all attempts in ms */
  durationMs: number;
  /** Driver that produced the result */
  handleId: string;
  /** Crash retries consumed */
  retryCount: number;
  /** Attempts made (retryCount + 1) */
  attempts: number;
  startedAt: Date;
  completedAt: Date;
}

/**
 * Successful task result
 */
export interface TaskResult {
  taskId: string;
  data: ExtractedData;
  metadata: ExecutionMetadata;
}

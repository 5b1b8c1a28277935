/**
 * Executor Implementation
 *
 * Runs one task against a pool: lease, execute, release, and retry on a
 * driver crash with a freshly leased driver.
 */

import {
  DroverError,
  Errors,
  componentLogger,
  fail,
  ok,
  toDroverError,
  type ExtractedData,
  type Logger,
  type Outcome,
  type Task,
  type TaskResult,
} from '@drover/core';
import type { Lease } from '@drover/session-pool';
import type {
  AttemptRecord,
  ExecutorConfig,
  ExecutorEvent,
  ExecutorEventHandler,
  ExecutorOptions,
  ExecutorStats,
  LeaseProvider,
} from './types.js';
import { DEFAULT_EXECUTOR_CONFIG } from './types.js';

interface AttemptOutcome {
  outcome: Outcome<{ data: ExtractedData; handleId: string }>;
  record: AttemptRecord;
}

/**
 * Error codes retried with a fresh driver
 */
const RETRIED_CODES: ReadonlySet<string> = new Set(['DRIVER_CRASHED']);

/**
 * Copy of a failure carrying the attempt history
 */
function withAttempts(error: DroverError, attempts: AttemptRecord[]): DroverError {
  return new DroverError(error.code, error.message, {
    retryable: error.retryable,
    userMessage: error.userMessage,
    details: { ...error.details, attempts },
    cause: error.cause,
  });
}

/**
 * Task Executor class
 */
export class TaskExecutor {
  private readonly config: ExecutorConfig;
  private readonly logger: Logger;
  private readonly eventHandlers: Set<ExecutorEventHandler> = new Set();
  private executing = 0;
  private completedCount = 0;
  private failedCount = 0;
  private attemptCount = 0;
  private retryCount = 0;
  private totalDuration = 0;
  private readonly failuresByCode: ExecutorStats['failuresByCode'] = {};

  constructor(config: ExecutorConfig = {}, options: ExecutorOptions = {}) {
    this.config = {
      ...DEFAULT_EXECUTOR_CONFIG,
      ...config,
    };
    this.logger = componentLogger(options.logger, 'executor');
  }

  /**
   * Subscribe to executor events
   */
  on(handler: ExecutorEventHandler): () => void {
    this.eventHandlers.add(handler);
    return () => this.eventHandlers.delete(handler);
  }

  /**
   * Run a task
   *
   * Attempts are bounded by `task.maxRetries + 1`. Only DRIVER_CRASHED is
   * retried; every other failure is returned at once. The leased driver is
   * always released before this resolves.
   */
  async run(task: Task, pool: LeaseProvider): Promise<Outcome<TaskResult>> {
    const startedAt = new Date();
    const attempts: AttemptRecord[] = [];
    this.executing++;

    try {
      let attempt = 0;
      while (true) {
        const { outcome, record } = await this.attempt(task, pool, attempt);
        attempts.push(record);

        if (outcome.success) {
          const completedAt = new Date();
          const result: TaskResult = {
            taskId: task.id,
            data: outcome.value.data,
            metadata: {
              durationMs: completedAt.getTime() - startedAt.getTime(),
              handleId: outcome.value.handleId,
              retryCount: attempt,
              attempts: attempts.length,
              startedAt,
              completedAt,
            },
          };

          this.completedCount++;
          this.totalDuration += result.metadata.durationMs;
          this.emit({
            type: 'task_completed',
            taskId: task.id,
            attempt,
            handleId: outcome.value.handleId,
            details: { durationMs: result.metadata.durationMs, retryCount: attempt },
          });
          return ok(result);
        }

        const error = outcome.error;
        if (!RETRIED_CODES.has(error.code) || attempt >= task.maxRetries) {
          return this.failed(task, withAttempts(error, attempts), attempt, startedAt);
        }

        this.retryCount++;
        this.logger.warn(
          { taskId: task.id, attempt, handleId: record.handleId, code: error.code },
          'Retrying task on a fresh driver'
        );
        this.emit({
          type: 'task_retry',
          taskId: task.id,
          attempt,
          handleId: record.handleId,
          details: { code: error.code, remaining: task.maxRetries - attempt },
        });
        attempt++;
      }
    } finally {
      this.executing--;
    }
  }

  /**
   * Get executor statistics
   */
  getStats(): ExecutorStats {
    const total = this.completedCount + this.failedCount;

    return {
      executing: this.executing,
      totalCompleted: this.completedCount,
      totalFailed: this.failedCount,
      totalAttempts: this.attemptCount,
      totalRetries: this.retryCount,
      failuresByCode: { ...this.failuresByCode },
      avgDurationMs: total > 0 ? this.totalDuration / total : 0,
      successRate: total > 0 ? this.completedCount / total : 0,
    };
  }

  /**
   * One lease, execute, release cycle
   */
  private async attempt(task: Task, pool: LeaseProvider, attempt: number): Promise<AttemptOutcome> {
    const started = Date.now();
    this.attemptCount++;
    this.emit({ type: 'attempt_started', taskId: task.id, attempt, details: {} });

    let lease: Lease;
    try {
      lease = await pool.lease(this.config.leaseTimeoutMs);
    } catch (error) {
      return this.settleAttempt(task, attempt, started, fail(toDroverError(error)));
    }

    const handleId = lease.handle.id;
    let outcome: Outcome<ExtractedData>;
    let verify = false;
    try {
      outcome = await lease.handle.execute(task);
    } catch (error) {
      // The driver may be in any state; probe it before reuse
      verify = true;
      this.logger.error({ err: error, taskId: task.id, handleId }, 'Unexpected fault during execution');
      outcome = fail(
        Errors.internalError(`Unexpected fault running task ${task.id}: ${toDroverError(error).message}`, error)
      );
    } finally {
      pool.release(lease, { verify });
    }

    return this.settleAttempt(
      task,
      attempt,
      started,
      outcome.success ? ok({ data: outcome.value, handleId }) : outcome,
      handleId
    );
  }

  private settleAttempt(
    task: Task,
    attempt: number,
    started: number,
    outcome: AttemptOutcome['outcome'],
    handleId?: string
  ): AttemptOutcome {
    const record: AttemptRecord = {
      attempt,
      handleId,
      outcome: outcome.success ? 'success' : outcome.error.code,
      durationMs: Date.now() - started,
    };

    if (!outcome.success) {
      record.error = outcome.error.message;
      this.emit({
        type: 'attempt_failed',
        taskId: task.id,
        attempt,
        handleId,
        details: { code: outcome.error.code, message: outcome.error.message },
      });
    }

    return { outcome, record };
  }

  private failed(task: Task, error: DroverError, attempt: number, startedAt: Date): Outcome<TaskResult> {
    const durationMs = Date.now() - startedAt.getTime();
    this.failedCount++;
    this.totalDuration += durationMs;
    this.failuresByCode[error.code] = (this.failuresByCode[error.code] ?? 0) + 1;

    this.logger.info({ taskId: task.id, code: error.code, attempts: attempt + 1, durationMs }, 'Task failed');
    this.emit({
      type: 'task_failed',
      taskId: task.id,
      attempt,
      details: { code: error.code, message: error.message, durationMs },
    });
    return fail(error);
  }

  /**
   * Deliver an event; a throwing handler does not affect the task
   */
  private emit(event: Omit<ExecutorEvent, 'timestamp'>): void {
    const full: ExecutorEvent = { ...event, timestamp: new Date() };
    for (const handler of this.eventHandlers) {
      try {
        handler(full);
      } catch (error) {
        this.logger.error({ err: error, event: event.type }, 'Event handler error');
      }
    }
  }
}

/**
 * Create a new task executor
 */
export function createTaskExecutor(config?: ExecutorConfig, options?: ExecutorOptions): TaskExecutor {
  return new TaskExecutor(config, options);
}

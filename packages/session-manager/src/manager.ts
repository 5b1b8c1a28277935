/**
 * Session Manager Implementation
 *
 * Public entry point: accepts task submissions while ready, delegates them to
 * the executor, and drains in-flight work on shutdown.
 */

import {
  DEFAULT_CONFIG,
  Errors,
  componentLogger,
  createTask,
  fail,
  toDroverError,
  type Logger,
  type Outcome,
  type Task,
  type TaskResult,
} from '@drover/core';
import { TaskExecutor } from '@drover/executor';
import type { DriverPool } from '@drover/session-pool';
import type {
  HealthReport,
  ManagerEvent,
  ManagerEventHandler,
  ManagerState,
  OutcomeClass,
  SessionManagerConfig,
  SessionManagerOptions,
} from './types.js';
import { OUTCOME_CLASS_BY_CODE } from './types.js';

/**
 * Default session manager configuration
 */
export const DEFAULT_MANAGER_CONFIG: SessionManagerConfig = {
  defaultTimeoutMs: DEFAULT_CONFIG.task.defaultTimeoutMs,
  defaultMaxRetries: DEFAULT_CONFIG.task.defaultMaxRetries,
  drainTimeoutMs: DEFAULT_CONFIG.manager.drainTimeoutMs,
  warmupCount: DEFAULT_CONFIG.pool.warmupCount,
};

/**
 * Outcome class of a submission's outcome
 */
export function classifyOutcome(outcome: Outcome<unknown>): OutcomeClass {
  return outcome.success ? 'success' : OUTCOME_CLASS_BY_CODE[outcome.error.code];
}

function emptyCounts(): Record<OutcomeClass, number> {
  return {
    success: 0,
    timeout: 0,
    action_failed: 0,
    crashed: 0,
    exhausted: 0,
    closed: 0,
    launch_failed: 0,
    invalid: 0,
    not_ready: 0,
    error: 0,
  };
}

/**
 * Session Manager class
 */
export class SessionManager {
  private readonly config: SessionManagerConfig;
  private readonly executor: TaskExecutor;
  private readonly logger: Logger;
  private readonly inFlight: Set<Promise<Outcome<TaskResult>>> = new Set();
  private readonly eventHandlers: Set<ManagerEventHandler> = new Set();
  private readonly submissions = emptyCounts();
  private currentState: ManagerState = 'starting';
  private readyAt: number | null = null;
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly pool: DriverPool,
    config: Partial<SessionManagerConfig> = {},
    options: SessionManagerOptions = {}
  ) {
    this.config = {
      ...DEFAULT_MANAGER_CONFIG,
      ...config,
    };
    this.logger = componentLogger(options.logger, 'session-manager');
    this.executor = options.executor ?? new TaskExecutor({}, { logger: options.logger });
  }

  get state(): ManagerState {
    return this.currentState;
  }

  /**
   * Subscribe to manager events
   */
  on(handler: ManagerEventHandler): () => void {
    this.eventHandlers.add(handler);
    return () => this.eventHandlers.delete(handler);
  }

  /**
   * Warm the pool, start its health checks and begin accepting tasks
   */
  async start(): Promise<void> {
    if (this.currentState !== 'starting') return;

    if (this.config.warmupCount > 0) {
      await this.pool.warm(this.config.warmupCount);
    }

    // shutdown() may have been called during warm-up
    if (this.currentState !== 'starting') return;

    this.pool.startHealthChecks();
    this.readyAt = Date.now();
    this.setState('ready');
  }

  /**
   * Submit a task
   *
   * Never throws: validation failures, pool errors and driver failures all
   * come back as failed outcomes.
   */
  async submit(input: unknown): Promise<Outcome<TaskResult>> {
    const startedAt = Date.now();

    if (this.currentState !== 'ready') {
      return this.finish(undefined, fail(Errors.notReady(this.currentState)), startedAt);
    }

    let task: Task;
    try {
      task = createTask(input, {
        timeoutMs: this.config.defaultTimeoutMs,
        maxRetries: this.config.defaultMaxRetries,
      });
    } catch (error) {
      return this.finish(undefined, fail(toDroverError(error)), startedAt);
    }

    const run = this.executor.run(task, this.pool);
    this.inFlight.add(run);

    let outcome: Outcome<TaskResult>;
    try {
      outcome = await run;
    } catch (error) {
      this.logger.error({ err: error, taskId: task.id }, 'Executor failed');
      outcome = fail(Errors.internalError(`Task ${task.id} failed unexpectedly`, error));
    } finally {
      this.inFlight.delete(run);
    }

    return this.finish(task.id, outcome, startedAt);
  }

  /**
   * Report state, in-flight work and pool status
   */
  healthCheck(): HealthReport {
    return {
      state: this.currentState,
      ready: this.currentState === 'ready',
      inFlight: this.inFlight.size,
      uptimeMs: this.readyAt === null ? 0 : Date.now() - this.readyAt,
      submissions: { ...this.submissions },
      executor: this.executor.getStats(),
      pool: this.pool.getStatus(),
    };
  }

  /**
   * Stop accepting tasks, wait for in-flight ones up to the drain timeout,
   * then close every driver. Idempotent.
   */
  shutdown(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.stop();
    }
    return this.stopping;
  }

  private async stop(): Promise<void> {
    this.setState('draining');

    const pending = this.inFlight.size;
    const drained = await this.drain();
    if (!drained) {
      this.logger.warn(
        { inFlight: this.inFlight.size, drainTimeoutMs: this.config.drainTimeoutMs },
        'Drain timed out; closing drivers under running tasks'
      );
    } else if (pending > 0) {
      this.logger.info({ drained: pending }, 'In-flight tasks drained');
    }

    await this.pool.shutdown();
    this.setState('stopped');
  }

  /**
   * Wait for in-flight tasks; false when the drain timeout elapses first
   */
  private async drain(): Promise<boolean> {
    if (this.inFlight.size === 0) {
      return true;
    }

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.config.drainTimeoutMs);
    });
    const drained = Promise.allSettled(this.inFlight).then(() => true);

    try {
      return await Promise.race([drained, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private finish(
    taskId: string | undefined,
    outcome: Outcome<TaskResult>,
    startedAt: number
  ): Outcome<TaskResult> {
    const outcomeClass = classifyOutcome(outcome);
    const durationMs = Date.now() - startedAt;
    this.submissions[outcomeClass]++;

    if (outcome.success) {
      this.logger.info(
        { taskId, outcome: outcomeClass, durationMs, retryCount: outcome.value.metadata.retryCount },
        'Task completed'
      );
    } else {
      this.logger.warn(
        { taskId, outcome: outcomeClass, durationMs, code: outcome.error.code, error: outcome.error.message },
        'Task failed'
      );
    }

    this.emit({ type: 'task_finished', taskId, details: { outcome: outcomeClass, durationMs } });
    return outcome;
  }

  private setState(state: ManagerState): void {
    const previous = this.currentState;
    this.currentState = state;
    this.logger.info({ from: previous, to: state }, 'Session manager state changed');
    this.emit({ type: 'state_changed', details: { from: previous, to: state } });
  }

  private emit(event: Omit<ManagerEvent, 'timestamp'>): void {
    const full: ManagerEvent = { ...event, timestamp: new Date() };
    for (const handler of this.eventHandlers) {
      try {
        handler(full);
      } catch (error) {
        this.logger.error({ err: error, event: event.type }, 'Event handler error');
      }
    }
  }
}

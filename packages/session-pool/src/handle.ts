/**
 * Driver Handle
 *
 * One live browser session. Subclasses implement the browser-specific steps;
 * this class owns state, the per-task time budget and failure classification.
 */

import {
  DEFAULT_TIMEOUTS,
  Errors,
  componentLogger,
  extractAll,
  fail,
  ok,
  toDroverError,
  type Action,
  type ExtractedData,
  type Logger,
  type Outcome,
  type Task,
} from '@drover/core';
import type { DriverHandleInfo, HandleState, StepContext } from './types.js';

/**
 * Base class for driver handles
 */
export abstract class DriverHandle {
  /** Unique handle ID */
  readonly id: string;

  /** Created timestamp */
  readonly createdAt: Date = new Date();

  protected readonly logger: Logger;

  private currentState: HandleState = 'idle';
  private lastUsed: Date;
  private served = 0;
  private verificationPending = false;
  private closing: Promise<void> | null = null;

  constructor(id: string, logger?: Logger) {
    this.id = id;
    this.lastUsed = this.createdAt;
    this.logger = componentLogger(logger, 'driver').child({ handleId: id });
  }

  /**
   * Run one action
   */
  protected abstract performAction(action: Action, index: number, task: Task, ctx: StepContext): Promise<void>;

  /**
   * Raw values matched by a selector: rendered text, or the named attribute
   */
  protected abstract readSelector(selector: string, attribute: string | undefined, ctx: StepContext): Promise<string[]>;

  /**
   * Cheap round-trip to the browser
   */
  protected abstract probe(): Promise<boolean>;

  /**
   * Terminate the browser session
   */
  protected abstract terminate(): Promise<void>;

  /**
   * Whether a step failure means the browser itself is gone
   */
  protected abstract isCrash(error: unknown): boolean;

  get state(): HandleState {
    return this.currentState;
  }

  get lastUsedAt(): Date {
    return this.lastUsed;
  }

  get taskCount(): number {
    return this.served;
  }

  /**
   * Set when a task timed out on this handle; the pool probes it before reuse
   */
  get needsVerification(): boolean {
    return this.verificationPending;
  }

  /**
   * Snapshot for monitoring
   */
  info(): DriverHandleInfo {
    return {
      id: this.id,
      state: this.currentState,
      createdAt: this.createdAt,
      lastUsedAt: this.lastUsed,
      taskCount: this.served,
    };
  }

  /**
   * Mark the handle leased
   *
   * @throws DroverError INTERNAL_ERROR if the handle is not idle
   */
  acquire(): void {
    if (this.currentState !== 'idle') {
      throw Errors.internalError(`Driver ${this.id} leased while ${this.currentState}`);
    }
    this.currentState = 'busy';
  }

  /**
   * Return the handle to idle after use or a passed probe
   */
  markIdle(): void {
    if (this.currentState !== 'busy' && this.currentState !== 'probing') {
      throw Errors.internalError(`Driver ${this.id} cannot become idle while ${this.currentState}`);
    }
    this.currentState = 'idle';
    this.verificationPending = false;
  }

  /**
   * Hold the handle out of rotation while its health is re-verified
   */
  markProbing(): void {
    if (this.currentState !== 'busy' && this.currentState !== 'idle') {
      throw Errors.internalError(`Driver ${this.id} cannot be probed while ${this.currentState}`);
    }
    this.currentState = 'probing';
  }

  /**
   * Mark the handle crashed. A closed handle stays closed.
   */
  markCrashed(): void {
    if (this.currentState !== 'closed') {
      this.currentState = 'crashed';
    }
  }

  /**
   * Run a task's actions and extraction within its time budget
   *
   * When the budget elapses the in-flight step is abandoned through the abort
   * signal and a timeout is returned at once; whatever the abandoned work does
   * afterwards does not change the handle's state.
   */
  async execute(task: Task): Promise<Outcome<ExtractedData>> {
    if (this.currentState === 'crashed' || this.currentState === 'closed') {
      return fail(Errors.driverCrashed(this.id));
    }

    this.served++;
    this.lastUsed = new Date();
    this.verificationPending = false;

    const controller = new AbortController();
    const deadline = Date.now() + task.timeoutMs;
    const ctx: StepContext = {
      signal: controller.signal,
      deadline,
      remainingMs: () => Math.max(1, deadline - Date.now()),
    };

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), task.timeoutMs);
    });
    const run = this.runSteps(task, ctx);

    try {
      const winner = await Promise.race([run, timedOut]);
      if (winner !== 'timeout') {
        return winner;
      }

      controller.abort(new Error(`Task ${task.id} exceeded ${task.timeoutMs}ms`));
      this.verificationPending = true;
      this.logger.warn({ taskId: task.id, timeoutMs: task.timeoutMs }, 'Task timed out');

      void run.then((late) => {
        this.logger.debug({ taskId: task.id, success: late.success }, 'Abandoned task settled');
      });

      return fail(Errors.driverTimeout(this.id, task.timeoutMs));
    } finally {
      clearTimeout(timer);
      this.lastUsed = new Date();
    }
  }

  /**
   * Liveness probe; false on failure or when the probe exceeds `timeoutMs`
   */
  async isHealthy(timeoutMs: number = DEFAULT_TIMEOUTS.HEALTH_PROBE): Promise<boolean> {
    if (this.currentState === 'crashed' || this.currentState === 'closed') {
      return false;
    }

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([this.probe(), expired]);
    } catch (error) {
      this.logger.debug({ err: error }, 'Health probe failed');
      return false;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Terminate the session. Idempotent; never throws.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.currentState = 'closed';
      this.closing = this.terminate().catch((error: unknown) => {
        this.logger.warn({ err: error }, 'Error closing browser');
      });
    }
    return this.closing;
  }

  private async runSteps(task: Task, ctx: StepContext): Promise<Outcome<ExtractedData>> {
    for (const [index, action] of task.actions.entries()) {
      try {
        await this.performAction(action, index, task, ctx);
      } catch (error) {
        return this.stepFailure(task, index, action.type, error, ctx);
      }
    }

    try {
      const data = await extractAll(task.extract, (selector, attribute) =>
        this.readSelector(selector, attribute, ctx)
      );
      return ok(data);
    } catch (error) {
      return this.stepFailure(task, task.actions.length, 'extract', error, ctx);
    }
  }

  private stepFailure(
    task: Task,
    step: number,
    action: string,
    error: unknown,
    ctx: StepContext
  ): Outcome<never> {
    // Already reported as a timeout
    if (ctx.signal.aborted) {
      return fail(Errors.driverTimeout(this.id, task.timeoutMs));
    }

    if (this.isCrash(error)) {
      this.markCrashed();
      this.logger.error({ err: error, taskId: task.id, step }, 'Driver crashed');
      return fail(Errors.driverCrashed(this.id, error));
    }

    this.logger.info({ taskId: task.id, step, action, error: toDroverError(error).message }, 'Action failed');
    return fail(Errors.actionFailed(step, action, error));
  }
}

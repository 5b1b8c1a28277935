/**
 * In-memory driver
 *
 * Runs tasks without a browser. Latency, crashes, step failures, faults,
 * probe results and launch failures are scripted through options. Used in
 * development and tests.
 */

import {
  sleep,
  type Action,
  type ExtractedData,
  type Logger,
  type Outcome,
  type Task,
} from '@drover/core';
import { DriverHandle } from './handle.js';
import type { DriverFactory, StepContext } from './types.js';

/**
 * What one execution does
 *
 * - `ok`: every step succeeds
 * - `crash`: the browser dies on the first action
 * - `fault`: execute() itself throws before any action
 * - `{ failAt }`: the step at that index fails (`actions.length` is extraction)
 * - `{ faultAt }`: the steps before that index run, then execute() throws
 */
export type MemoryBehavior =
  | 'ok'
  | 'crash'
  | 'fault'
  | { failAt: number; message?: string }
  | { faultAt: number };

export interface MemoryDriverOptions {
  /** Latency of every non-wait action */
  stepDelayMs?: number;
  /** Latency of every launch */
  launchDelayMs?: number;
  /** Latency of every health probe */
  probeDelayMs?: number;
  /**
   * Page content: selector (or `selector@attribute`) to matched values.
   * When set, waitForSelector fails for selectors it does not list.
   */
  page?: Record<string, readonly string[]>;
  /** Behaviour of the n-th execution across all handles (1-based) */
  behavior?: (call: number, task: Task, handleId: string) => MemoryBehavior;
  /** Launch attempts (1-based) that fail */
  failLaunches?: readonly number[];
  /** Probe result per handle; defaults to healthy while connected */
  healthy?: (handleId: string) => boolean;
  logger?: Logger;
}

export interface MemoryDriverStats {
  launchAttempts: number;
  launched: number;
  closed: number;
  executions: number;
  /** Executions in flight */
  running: number;
  peakRunning: number;
  /** Executions started on a handle that was already executing */
  overlaps: number;
  /** URLs navigated to, in order */
  visited: string[];
}

/**
 * Error thrown when a scripted crash takes the browser down
 */
export class MemoryDriverCrash extends Error {
  constructor(handleId: string) {
    super(`Session ${handleId} disconnected`);
    this.name = 'MemoryDriverCrash';
  }
}

/**
 * Error escaping execute() when a scripted fault fires mid-task
 */
export class MemoryDriverFault extends Error {
  constructor(call: number, step: number) {
    super(`Injected fault at step ${step} of execution ${call}`);
    this.name = 'MemoryDriverFault';
  }
}

/**
 * Creates in-memory driver handles and records what they do
 */
export class MemoryDriverFactory {
  readonly stats: MemoryDriverStats = {
    launchAttempts: 0,
    launched: 0,
    closed: 0,
    executions: 0,
    running: 0,
    peakRunning: 0,
    overlaps: 0,
    visited: [],
  };

  readonly handles: MemoryDriverHandle[] = [];

  constructor(readonly options: MemoryDriverOptions = {}) {}

  /**
   * Launch one handle
   */
  create: DriverFactory = async (id) => {
    const attempt = ++this.stats.launchAttempts;
    if (this.options.launchDelayMs) {
      await sleep(this.options.launchDelayMs);
    }
    if (this.options.failLaunches?.includes(attempt)) {
      throw new Error(`Launch ${attempt} refused`);
    }

    const handle = new MemoryDriverHandle(id, this);
    this.stats.launched++;
    this.handles.push(handle);
    return handle;
  };

  /** @internal */
  begin(): number {
    this.stats.executions++;
    this.stats.running++;
    this.stats.peakRunning = Math.max(this.stats.peakRunning, this.stats.running);
    return this.stats.executions;
  }

  /** @internal */
  end(): void {
    this.stats.running--;
  }
}

/**
 * Driver handle backed by MemoryDriverFactory options
 */
export class MemoryDriverHandle extends DriverHandle {
  private connected = true;
  private executing = false;
  private plan: MemoryBehavior = 'ok';
  private extractionStep = 0;
  private fault: MemoryDriverFault | null = null;
  private call = 0;

  constructor(
    id: string,
    private readonly factory: MemoryDriverFactory
  ) {
    super(id, factory.options.logger);
  }

  /** Whether the simulated browser is still up */
  get isConnected(): boolean {
    return this.connected;
  }

  /**
   * Take the browser down, as if the process died
   */
  disconnect(): void {
    this.connected = false;
  }

  override async execute(task: Task): Promise<Outcome<ExtractedData>> {
    if (this.executing) {
      this.factory.stats.overlaps++;
    }
    const call = this.factory.begin();
    this.call = call;
    this.plan = this.factory.options.behavior?.(call, task, this.id) ?? 'ok';
    this.extractionStep = task.actions.length;
    this.fault = null;
    this.executing = true;

    try {
      if (this.plan === 'fault') {
        throw new Error(`Injected fault in execution ${call}`);
      }
      const outcome = await super.execute(task);
      if (this.fault) {
        throw this.fault;
      }
      return outcome;
    } finally {
      this.executing = false;
      this.factory.end();
    }
  }

  protected async performAction(action: Action, index: number, task: Task, ctx: StepContext): Promise<void> {
    if (!this.connected) {
      throw new MemoryDriverCrash(this.id);
    }
    if (this.plan === 'crash') {
      this.connected = false;
      throw new MemoryDriverCrash(this.id);
    }

    if (action.type === 'wait') {
      await sleep(action.durationMs, ctx.signal);
    } else if (this.factory.options.stepDelayMs) {
      await sleep(this.factory.options.stepDelayMs, ctx.signal);
    }

    if (typeof this.plan === 'object') {
      if ('faultAt' in this.plan && this.plan.faultAt === index) {
        this.fault = new MemoryDriverFault(this.call, index);
        throw this.fault;
      }
      if ('failAt' in this.plan && this.plan.failAt === index) {
        throw new Error(this.plan.message ?? `Step ${index} failed`);
      }
    }

    switch (action.type) {
      case 'navigate':
        this.factory.stats.visited.push(action.url ?? task.target);
        break;
      case 'waitForSelector': {
        const page = this.factory.options.page;
        if (page && !(action.selector in page)) {
          throw new Error(`Waiting for selector "${action.selector}" failed`);
        }
        break;
      }
      default:
        break;
    }
  }

  protected async readSelector(selector: string, attribute: string | undefined, ctx: StepContext): Promise<string[]> {
    if (!this.connected) {
      throw new MemoryDriverCrash(this.id);
    }
    if (ctx.signal.aborted) {
      throw ctx.signal.reason;
    }
    if (typeof this.plan === 'object' && 'failAt' in this.plan && this.plan.failAt === this.extractionStep) {
      throw new Error(this.plan.message ?? 'Extraction failed');
    }

    const page = this.factory.options.page ?? {};
    const key = attribute === undefined ? selector : `${selector}@${attribute}`;
    return [...(page[key] ?? [])];
  }

  protected async probe(): Promise<boolean> {
    if (this.factory.options.probeDelayMs) {
      await sleep(this.factory.options.probeDelayMs);
    }
    return this.connected && (this.factory.options.healthy?.(this.id) ?? true);
  }

  protected async terminate(): Promise<void> {
    this.connected = false;
    this.factory.stats.closed++;
  }

  protected isCrash(error: unknown): boolean {
    return error instanceof MemoryDriverCrash;
  }
}

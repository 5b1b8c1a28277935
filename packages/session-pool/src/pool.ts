/**
 * Driver Pool Implementation
 *
 * Bounded pool of driver handles: leasing, release, crash replacement,
 * idle expiry and periodic health checks.
 *
 * Bookkeeping happens synchronously between awaits. A launch reserves its
 * capacity slot before the factory is awaited, so the pool never holds more
 * than maxSize handles, launches included.
 */

import {
  DEFAULT_CONFIG,
  Errors,
  ID_PREFIX,
  componentLogger,
  generatePrefixedId,
  isDroverError,
  toDroverError,
  type DroverError,
  type Logger,
  type PoolSettings,
} from '@drover/core';
import type { DriverHandle } from './handle.js';
import type {
  DriverFactory,
  DriverHandleInfo,
  HealthCheckSummary,
  Lease,
  PoolStatus,
  ReleaseOptions,
  RetireReason,
} from './types.js';

/**
 * Default pool settings
 */
export const DEFAULT_POOL_SETTINGS: PoolSettings = { ...DEFAULT_CONFIG.pool };

export interface DriverPoolOptions {
  logger?: Logger;
}

interface Waiter {
  resolve: (lease: Lease) => void;
  reject: (error: DroverError) => void;
  timer: NodeJS.Timeout;
}

/**
 * Driver Pool class
 */
export class DriverPool {
  private readonly config: PoolSettings;
  private readonly logger: Logger;
  private readonly handles: Map<string, DriverHandle> = new Map();
  private readonly leases: Map<string, Lease> = new Map();
  private readonly waiters: Waiter[] = [];
  private readonly background: Set<Promise<void>> = new Set();
  private launching = 0;
  private pendingSpares = 0;
  private closed = false;
  private healthCheckTimer: NodeJS.Timeout | null = null;
  private readonly totals = {
    created: 0,
    launchFailures: 0,
    crashed: 0,
    expired: 0,
    recycled: 0,
    leases: 0,
  };

  constructor(
    private readonly factory: DriverFactory,
    config: Partial<PoolSettings> = {},
    options: DriverPoolOptions = {}
  ) {
    this.config = {
      ...DEFAULT_POOL_SETTINGS,
      ...config,
    };
    this.logger = componentLogger(options.logger, 'driver-pool');

    if (!Number.isInteger(this.config.maxSize) || this.config.maxSize < 1) {
      throw Errors.configurationError(`Pool maxSize must be a positive integer, got ${this.config.maxSize}`);
    }
  }

  /**
   * Lease a driver
   *
   * Reuses an idle driver, launches one while below capacity, or waits in
   * FIFO order for a release.
   *
   * @throws DroverError POOL_EXHAUSTED when nothing frees up within the timeout
   * @throws DroverError POOL_CLOSED after shutdown
   * @throws DroverError DRIVER_LAUNCH_FAILED when the browser cannot start
   */
  async lease(timeoutMs: number = this.config.leaseTimeoutMs): Promise<Lease> {
    if (this.closed) {
      throw Errors.poolClosed();
    }

    // Queued callers go first
    if (this.waiters.length === 0) {
      const idle = this.takeIdle();
      if (idle) {
        return this.grant(idle);
      }
      if (this.capacity() > 0) {
        let handle: DriverHandle;
        try {
          handle = await this.launch();
        } catch (error) {
          // Callers queued behind this launch still need a driver
          this.dispatch();
          throw error;
        }
        return this.grant(handle);
      }
    }

    return this.enqueue(timeoutMs);
  }

  /**
   * Return a leased driver
   *
   * Returns false if the lease was already released.
   */
  release(lease: Lease, options: ReleaseOptions = {}): boolean {
    if (!this.leases.delete(lease.id)) {
      this.logger.warn({ leaseId: lease.id, handleId: lease.handle.id }, 'Lease released twice');
      return false;
    }

    const handle = lease.handle;

    if (this.closed || handle.state === 'closed') {
      if (this.handles.has(handle.id)) {
        this.retire(handle, 'shutdown');
      }
      return true;
    }

    if (handle.state === 'crashed') {
      this.retire(handle, 'crashed');
      this.scheduleReplacement();
      return true;
    }

    if (options.verify || handle.needsVerification) {
      handle.markProbing();
      this.track(this.verify(handle));
      return true;
    }

    if (this.config.maxTasksPerHandle > 0 && handle.taskCount >= this.config.maxTasksPerHandle) {
      this.retire(handle, 'recycled');
      this.dispatch();
      return true;
    }

    handle.markIdle();
    this.dispatch();
    return true;
  }

  /**
   * Launch up to `count` idle drivers, within capacity
   *
   * @returns Number of drivers launched
   */
  async warm(count: number = this.config.warmupCount): Promise<number> {
    const launches: Promise<DriverHandle>[] = [];
    while (launches.length < count && this.capacity() > 0 && !this.closed) {
      launches.push(this.launch());
    }

    let launched = 0;
    for (const result of await Promise.allSettled(launches)) {
      if (result.status === 'fulfilled') {
        launched++;
        if (!this.closed) {
          result.value.markIdle();
        }
      }
    }

    this.dispatch();
    this.logger.info({ requested: count, launched }, 'Pool warmed');
    return launched;
  }

  /**
   * Close idle drivers unused for longer than the idle expiry
   *
   * @returns Number of drivers closed
   */
  sweep(): number {
    let expired = 0;
    for (const handle of this.handles.values()) {
      if (handle.state === 'idle' && this.isExpired(handle)) {
        this.retire(handle, 'expired');
        expired++;
      }
    }
    return expired;
  }

  /**
   * Probe every idle driver; unhealthy ones are retired and replaced
   *
   * @returns Number of drivers that failed their probe
   */
  async probeIdle(): Promise<number> {
    const idle = Array.from(this.handles.values()).filter((handle) => handle.state === 'idle');
    for (const handle of idle) {
      handle.markProbing();
    }

    const results = await Promise.all(idle.map((handle) => this.verify(handle)));
    return results.filter((healthy) => !healthy).length;
  }

  /**
   * Sweep expired drivers, then probe the remaining idle ones
   */
  async runHealthChecks(): Promise<HealthCheckSummary> {
    const expired = this.sweep();
    const unhealthy = await this.probeIdle();

    if (expired > 0 || unhealthy > 0) {
      this.logger.info({ expired, unhealthy }, 'Health check retired drivers');
    }

    return { expired, unhealthy };
  }

  /**
   * Start periodic health checks
   */
  startHealthChecks(): void {
    if (this.healthCheckTimer || this.closed || this.config.healthCheckIntervalMs <= 0) return;

    this.healthCheckTimer = setInterval(() => {
      this.track(this.runHealthChecks());
    }, this.config.healthCheckIntervalMs);
    this.healthCheckTimer.unref();
  }

  /**
   * Stop periodic health checks
   */
  stopHealthChecks(): void {
    if (this.healthCheckTimer) {
      clearInterval(this.healthCheckTimer);
      this.healthCheckTimer = null;
    }
  }

  /**
   * Wait for background probes, replacements and closes to finish
   */
  async settle(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all(this.background);
    }
  }

  /**
   * Shut down the pool
   *
   * Rejects waiting callers and closes every driver, leased ones included.
   */
  async shutdown(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.stopHealthChecks();

      for (const waiter of this.waiters.splice(0)) {
        clearTimeout(waiter.timer);
        waiter.reject(Errors.poolClosed());
      }

      const count = this.handles.size;
      for (const handle of this.handles.values()) {
        this.retire(handle, 'shutdown');
      }
      this.logger.info({ closed: count }, 'Driver pool shut down');
    }

    await this.settle();
  }

  /**
   * Whether shutdown() has been called
   */
  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Get pool status
   */
  getStatus(): PoolStatus {
    const counts = { idle: 0, busy: 0, probing: 0, crashed: 0 };
    for (const handle of this.handles.values()) {
      const state = handle.state;
      if (state !== 'closed') {
        counts[state]++;
      }
    }

    return {
      maxSize: this.config.maxSize,
      total: this.handles.size + this.launching,
      ...counts,
      launching: this.launching,
      waiting: this.waiters.length,
      activeLeases: this.leases.size,
      closed: this.closed,
      totals: { ...this.totals },
    };
  }

  /**
   * Snapshots of the drivers in the pool
   */
  getHandles(): DriverHandleInfo[] {
    return Array.from(this.handles.values()).map((handle) => handle.info());
  }

  private capacity(): number {
    return this.config.maxSize - this.handles.size - this.launching;
  }

  private isExpired(handle: DriverHandle): boolean {
    return Date.now() - handle.lastUsedAt.getTime() > this.config.idleExpiryMs;
  }

  /**
   * First reusable idle driver; expired ones met on the way are closed
   */
  private takeIdle(): DriverHandle | undefined {
    for (const handle of this.handles.values()) {
      if (handle.state !== 'idle') continue;
      if (this.isExpired(handle)) {
        this.retire(handle, 'expired');
        continue;
      }
      return handle;
    }
    return undefined;
  }

  private grant(handle: DriverHandle): Lease {
    if (handle.state === 'idle') {
      handle.acquire();
    }

    const lease: Lease = {
      id: generatePrefixedId(ID_PREFIX.LEASE),
      handle,
      leasedAt: new Date(),
    };
    this.leases.set(lease.id, lease);
    this.totals.leases++;
    return lease;
  }

  /**
   * Launch a driver into a reserved slot. The driver joins the pool busy.
   */
  private async launch(): Promise<DriverHandle> {
    const id = generatePrefixedId(ID_PREFIX.DRIVER);
    this.launching++;

    let handle: DriverHandle;
    try {
      handle = await this.factory(id);
    } catch (error) {
      this.launching--;
      this.totals.launchFailures++;
      this.logger.error({ err: error, handleId: id }, 'Driver launch failed');
      throw isDroverError(error) && error.code === 'DRIVER_LAUNCH_FAILED' ? error : Errors.driverLaunchFailed(error);
    }
    this.launching--;

    if (this.closed) {
      this.track(handle.close());
      throw Errors.poolClosed();
    }

    handle.acquire();
    this.handles.set(handle.id, handle);
    this.totals.created++;
    this.logger.info({ handleId: handle.id, total: this.handles.size }, 'Driver launched');
    return handle;
  }

  private enqueue(timeoutMs: number): Promise<Lease> {
    return new Promise<Lease>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          this.logger.warn({ timeoutMs, waiting: this.waiters.length }, 'Lease wait timed out');
          reject(Errors.poolExhausted(timeoutMs));
        }, timeoutMs),
      };

      this.waiters.push(waiter);
      this.dispatch();
    });
  }

  /**
   * Hand idle drivers to waiting callers, then launch for the rest while
   * capacity allows
   */
  private dispatch(): void {
    if (this.closed) return;

    let waiter = this.waiters[0];
    while (waiter) {
      const handle = this.takeIdle();
      if (!handle) break;

      this.waiters.shift();
      clearTimeout(waiter.timer);
      waiter.resolve(this.grant(handle));
      waiter = this.waiters[0];
    }

    while (this.pendingSpares < this.waiters.length && this.capacity() > 0) {
      this.spawnSpare();
    }
  }

  /**
   * Launch an idle driver in the background
   *
   * A failed launch fails the longest-waiting caller, if any.
   */
  private spawnSpare(): void {
    this.pendingSpares++;
    this.track(
      this.launch().then(
        (handle) => {
          this.pendingSpares--;
          if (this.closed) return;
          handle.markIdle();
          this.dispatch();
        },
        (error: unknown) => {
          this.pendingSpares--;
          const waiter = this.waiters.shift();
          if (waiter) {
            clearTimeout(waiter.timer);
            waiter.reject(toDroverError(error));
          }
          this.dispatch();
        }
      )
    );
  }

  /**
   * Restore capacity lost to a crash
   */
  private scheduleReplacement(): void {
    if (this.closed) return;

    // Waiting callers get a launch from dispatch(); otherwise keep a spare warm
    if (this.waiters.length > this.pendingSpares) {
      this.dispatch();
    } else if (this.capacity() > 0) {
      this.logger.debug('Scheduling replacement driver');
      this.spawnSpare();
    }
  }

  /**
   * Probe a driver in the probing state and settle it as idle or crashed
   */
  private async verify(handle: DriverHandle): Promise<boolean> {
    const healthy = await handle.isHealthy(this.config.probeTimeoutMs);

    // Closed by shutdown while probing
    if (handle.state !== 'probing') {
      return healthy;
    }

    if (healthy) {
      handle.markIdle();
      this.dispatch();
      return true;
    }

    this.logger.warn({ handleId: handle.id }, 'Driver failed health probe');
    this.retire(handle, 'crashed');
    this.scheduleReplacement();
    return false;
  }

  /**
   * Remove a driver from the pool and close it in the background
   */
  private retire(handle: DriverHandle, reason: RetireReason): void {
    this.handles.delete(handle.id);

    switch (reason) {
      case 'crashed':
        handle.markCrashed();
        this.totals.crashed++;
        break;
      case 'expired':
        this.totals.expired++;
        break;
      case 'recycled':
        this.totals.recycled++;
        break;
      case 'shutdown':
        break;
    }

    this.logger.info({ handleId: handle.id, reason, taskCount: handle.taskCount }, 'Driver retired');
    this.track(handle.close());
  }

  private track(work: Promise<unknown>): void {
    const tracked: Promise<void> = work
      .then(() => undefined)
      .catch((error: unknown) => {
        this.logger.error({ err: error }, 'Background pool work failed');
      })
      .finally(() => {
        this.background.delete(tracked);
      });
    this.background.add(tracked);
  }
}

/**
 * Create a new driver pool
 */
export function createDriverPool(
  factory: DriverFactory,
  config?: Partial<PoolSettings>,
  options?: DriverPoolOptions
): DriverPool {
  return new DriverPool(factory, config, options);
}

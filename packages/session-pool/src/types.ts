/**
 * Session Pool Types
 *
 * Types for browser driver pooling and leasing.
 */

import type { DriverHandle } from './handle.js';

/**
 * Driver handle state
 */
export type HandleState =
  | 'idle'     // Ready to lease
  | 'busy'     // Leased to one caller
  | 'probing'  // Health re-verification after a timeout or fault
  | 'crashed'  // Unresponsive; never reused
  | 'closed';  // Terminated

/**
 * Snapshot of a driver handle, for monitoring
 */
export interface DriverHandleInfo {
  id: string;
  state: HandleState;
  createdAt: Date;
  lastUsedAt: Date;
  taskCount: number;
}

/**
 * Launches one browser session
 */
export type DriverFactory = (id: string) => Promise<DriverHandle>;

/**
 * Execution context passed to each step of a task
 */
export interface StepContext {
  /** Aborted when the task's budget elapses */
  signal: AbortSignal;
  /** Epoch ms by which the task must finish */
  deadline: number;
  /** Milliseconds left before the deadline (at least 1) */
  remainingMs(): number;
}

/**
 * Exclusive grant of one driver to one caller
 */
export interface Lease {
  /** Lease ID */
  readonly id: string;
  /** The leased driver */
  readonly handle: DriverHandle;
  /** When the lease was granted */
  readonly leasedAt: Date;
}

/**
 * Release options
 */
export interface ReleaseOptions {
  /** Probe the driver before it is reused (e.g. after an unexpected fault) */
  verify?: boolean;
}

/**
 * Why a driver left the pool
 */
export type RetireReason = 'crashed' | 'expired' | 'recycled' | 'shutdown';

/**
 * Pool status, for external monitoring
 */
export interface PoolStatus {
  /** Configured capacity */
  maxSize: number;
  /** Drivers in the pool, launches included */
  total: number;
  idle: number;
  busy: number;
  probing: number;
  /** Crashed drivers still being torn down */
  crashed: number;
  /** Launches in flight */
  launching: number;
  /** Callers waiting for a lease */
  waiting: number;
  /** Leases not yet released */
  activeLeases: number;
  /** Whether shutdown() has been called */
  closed: boolean;
  /** Lifetime counters */
  totals: {
    created: number;
    launchFailures: number;
    crashed: number;
    expired: number;
    recycled: number;
    leases: number;
  };
}

/**
 * Result of a pool health check
 */
export interface HealthCheckSummary {
  /** Idle drivers closed for exceeding the idle expiry */
  expired: number;
  /** Idle drivers that failed their probe */
  unhealthy: number;
}

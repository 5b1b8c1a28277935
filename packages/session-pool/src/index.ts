/**
 * @drover/session-pool
 *
 * Browser driver pooling for Drover.
 */

// Types
export type {
  HandleState,
  DriverHandleInfo,
  DriverFactory,
  StepContext,
  Lease,
  ReleaseOptions,
  RetireReason,
  PoolStatus,
  HealthCheckSummary,
} from './types.js';

// Driver handles
export { DriverHandle } from './handle.js';
export {
  MemoryDriverFactory,
  MemoryDriverHandle,
  MemoryDriverCrash,
  MemoryDriverFault,
} from './memory-driver.js';
export type { MemoryBehavior, MemoryDriverOptions, MemoryDriverStats } from './memory-driver.js';
export {
  PlaywrightDriverHandle,
  createPlaywrightDriverFactory,
  isBrowserGoneError,
  performPageAction,
} from './playwright-driver.js';
export type { ActionLocator, ActionPage } from './playwright-driver.js';
export { findChromeExecutable, buildChromeArgs } from './chrome.js';

// Pool
export { DriverPool, createDriverPool, DEFAULT_POOL_SETTINGS } from './pool.js';
export type { DriverPoolOptions } from './pool.js';

/**
 * Composition root: configuration to pool to executor to manager
 */

import { DEFAULT_CONFIG, createLogger, type DroverConfig } from '@drover/core';
import { TaskExecutor } from '@drover/executor';
import { DriverPool, createPlaywrightDriverFactory } from '@drover/session-pool';
import { SessionManager } from './manager.js';
import type { CreateSessionManagerOptions } from './types.js';

/**
 * Create a session manager from configuration
 *
 * Drivers are launched through Playwright with system Chrome unless a
 * driver factory is supplied. Call start() before submitting.
 */
export function createSessionManager(
  config: DroverConfig = DEFAULT_CONFIG,
  options: CreateSessionManagerOptions = {}
): SessionManager {
  const logger = options.logger ?? createLogger(config.logging);
  const driverFactory = options.driverFactory ?? createPlaywrightDriverFactory(config.browser, logger);

  const pool = new DriverPool(driverFactory, config.pool, { logger });
  const executor = new TaskExecutor({ leaseTimeoutMs: config.pool.leaseTimeoutMs }, { logger });

  return new SessionManager(
    pool,
    {
      defaultTimeoutMs: config.task.defaultTimeoutMs,
      defaultMaxRetries: config.task.defaultMaxRetries,
      drainTimeoutMs: config.manager.drainTimeoutMs,
      warmupCount: config.pool.warmupCount,
    },
    { executor, logger }
  );
}

/**
 * Options and manager setup shared by commands
 */

import {
  createLogger,
  loadConfig,
  type ConfigOverrides,
  type DroverConfig,
  type Logger,
} from '@drover/core';
import { createSessionManager, type SessionManager } from '@drover/session-manager';

export interface CommonOptions {
  poolSize?: string;
  timeout?: string;
  retries?: string;
  chrome?: string;
  headless: boolean;
  format: string;
  verbose: boolean;
}

/**
 * Parse an integer option; `positive` also rejects 0
 */
export function parseInteger(name: string, value: string, positive = false): number {
  const parsed = value.trim() === '' ? NaN : Number(value);
  if (!Number.isInteger(parsed) || parsed < (positive ? 1 : 0)) {
    throw new Error(`--${name} must be a ${positive ? 'positive' : 'non-negative'} integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Configuration overrides from command-line options; unset options are left out
 */
export function buildOverrides(options: CommonOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {
    browser: { headless: options.headless },
  };

  if (options.poolSize !== undefined) {
    overrides.pool = { maxSize: parseInteger('pool-size', options.poolSize, true) };
  }

  const task: NonNullable<ConfigOverrides['task']> = {};
  if (options.timeout !== undefined) {
    task.defaultTimeoutMs = parseInteger('timeout', options.timeout, true);
  }
  if (options.retries !== undefined) {
    task.defaultMaxRetries = parseInteger('retries', options.retries);
  }
  overrides.task = task;

  if (options.chrome !== undefined) {
    overrides.browser = { ...overrides.browser, executablePath: options.chrome };
  }
  if (options.verbose) {
    overrides.logging = { level: 'debug' };
  }

  return overrides;
}

/**
 * Start a session manager, run `work`, and always shut the manager down
 */
export async function withManager<T>(
  options: CommonOptions,
  work: (manager: SessionManager, config: DroverConfig) => Promise<T>
): Promise<T> {
  const config = loadConfig(process.env, buildOverrides(options));
  const logger: Logger = createLogger({ ...config.logging, destination: 2 });
  const manager = createSessionManager(config, { logger });

  await manager.start();
  try {
    return await work(manager, config);
  } finally {
    await manager.shutdown();
  }
}

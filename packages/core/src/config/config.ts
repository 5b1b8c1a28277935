/**
 * Configuration
 *
 * Supplied once at process start from DROVER_* environment variables, over
 * DEFAULT_CONFIG. The CLI loads a .env file first.
 */

import { z } from 'zod';
import { BROWSER, CHROME_ARGS, DEFAULT_TIMEOUTS, DRIVER_POOL, MAX_RETRIES } from '../constants.js';
import { Errors } from '../errors.js';
import { formatValidationErrors, toValidationErrors } from '../utils/schema.js';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/**
 * Driver pool settings
 */
export interface PoolSettings {
  /** Maximum concurrent browser sessions */
  maxSize: number;
  /** How long lease() waits for a free driver */
  leaseTimeoutMs: number;
  /** Idle sessions older than this are closed instead of reused */
  idleExpiryMs: number;
  /** Interval of the sweep and idle probe (0 disables) */
  healthCheckIntervalMs: number;
  probeTimeoutMs: number;
  /** Tasks served before a session is recycled (0 = never) */
  maxTasksPerHandle: number;
  /** Sessions launched on start */
  warmupCount: number;
}

export interface TaskSettings {
  defaultTimeoutMs: number;
  defaultMaxRetries: number;
}

export interface ManagerSettings {
  /** Bounded wait for in-flight tasks on shutdown */
  drainTimeoutMs: number;
}

export interface BrowserSettings {
  headless: boolean;
  /** Chrome binary; discovered from the usual install paths when unset */
  executablePath?: string;
  userAgent: string;
  viewportWidth: number;
  viewportHeight: number;
  /** Chrome flags */
  args: string[];
  /** Parent directory of per-session profiles; the OS temp dir when unset */
  profileDir?: string;
  launchTimeoutMs: number;
}

export interface LoggingSettings {
  level: LogLevel;
  /** Human-readable output through pino-pretty */
  pretty: boolean;
}

export interface DroverConfig {
  pool: PoolSettings;
  task: TaskSettings;
  manager: ManagerSettings;
  browser: BrowserSettings;
  logging: LoggingSettings;
}

/**
 * Partial configuration, merged section by section
 */
export type ConfigOverrides = {
  [K in keyof DroverConfig]?: Partial<DroverConfig[K]>;
};

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: DroverConfig = {
  pool: {
    maxSize: DRIVER_POOL.MAX_SIZE,
    leaseTimeoutMs: DEFAULT_TIMEOUTS.LEASE,
    idleExpiryMs: DRIVER_POOL.IDLE_EXPIRY,
    healthCheckIntervalMs: DRIVER_POOL.HEALTH_CHECK_INTERVAL,
    probeTimeoutMs: DEFAULT_TIMEOUTS.HEALTH_PROBE,
    maxTasksPerHandle: DRIVER_POOL.MAX_TASKS_PER_HANDLE,
    warmupCount: DRIVER_POOL.WARMUP_COUNT,
  },
  task: {
    defaultTimeoutMs: DEFAULT_TIMEOUTS.TASK,
    defaultMaxRetries: MAX_RETRIES.TASK,
  },
  manager: {
    drainTimeoutMs: DEFAULT_TIMEOUTS.DRAIN,
  },
  browser: {
    headless: true,
    userAgent: BROWSER.USER_AGENT,
    viewportWidth: BROWSER.VIEWPORT_WIDTH,
    viewportHeight: BROWSER.VIEWPORT_HEIGHT,
    args: [...CHROME_ARGS],
    launchTimeoutMs: DEFAULT_TIMEOUTS.LAUNCH,
  },
  logging: {
    level: 'info',
    pretty: false,
  },
};

const count = z.coerce.number().int().nonnegative();
const positive = z.coerce.number().int().positive();
const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');
const list = z
  .string()
  .transform((value) => value.split(',').map((item) => item.trim()).filter((item) => item.length > 0));

/**
 * Environment variables understood by loadConfig
 */
export const EnvSchema = z.object({
  DROVER_POOL_MAX_SIZE: positive.optional(),
  DROVER_LEASE_TIMEOUT_MS: count.optional(),
  DROVER_IDLE_EXPIRY_MS: positive.optional(),
  DROVER_HEALTH_CHECK_INTERVAL_MS: count.optional(),
  DROVER_PROBE_TIMEOUT_MS: positive.optional(),
  DROVER_MAX_TASKS_PER_DRIVER: count.optional(),
  DROVER_WARMUP_COUNT: count.optional(),
  DROVER_TASK_TIMEOUT_MS: positive.optional(),
  DROVER_TASK_MAX_RETRIES: count.max(MAX_RETRIES.TASK_LIMIT).optional(),
  DROVER_DRAIN_TIMEOUT_MS: count.optional(),
  DROVER_HEADLESS: flag.optional(),
  DROVER_CHROME_PATH: z.string().min(1).optional(),
  DROVER_USER_AGENT: z.string().min(1).optional(),
  DROVER_CHROME_ARGS: list.optional(),
  DROVER_PROFILE_DIR: z.string().min(1).optional(),
  DROVER_LAUNCH_TIMEOUT_MS: positive.optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  LOG_PRETTY: flag.optional(),
});

/**
 * Merge overrides over a base configuration, section by section
 *
 * Keys present in an override replace the base value, so callers leave out
 * what they do not set.
 */
export function mergeConfig(base: DroverConfig, overrides: ConfigOverrides = {}): DroverConfig {
  return {
    pool: { ...base.pool, ...overrides.pool },
    task: { ...base.task, ...overrides.task },
    manager: { ...base.manager, ...overrides.manager },
    browser: { ...base.browser, ...overrides.browser },
    logging: { ...base.logging, ...overrides.logging },
  };
}

/**
 * Load configuration from environment variables
 *
 * Empty variables are treated as unset. Extra Chrome flags from
 * DROVER_CHROME_ARGS are appended to the defaults.
 *
 * @throws DroverError CONFIGURATION_ERROR when a variable is malformed
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {}
): DroverConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const errors = toValidationErrors(parsed.error);
    throw Errors.configurationError(`Invalid configuration: ${formatValidationErrors(errors)}`, { errors });
  }

  const vars = parsed.data;
  const base = DEFAULT_CONFIG;
  const fromEnv: DroverConfig = {
    pool: {
      maxSize: vars.DROVER_POOL_MAX_SIZE ?? base.pool.maxSize,
      leaseTimeoutMs: vars.DROVER_LEASE_TIMEOUT_MS ?? base.pool.leaseTimeoutMs,
      idleExpiryMs: vars.DROVER_IDLE_EXPIRY_MS ?? base.pool.idleExpiryMs,
      healthCheckIntervalMs: vars.DROVER_HEALTH_CHECK_INTERVAL_MS ?? base.pool.healthCheckIntervalMs,
      probeTimeoutMs: vars.DROVER_PROBE_TIMEOUT_MS ?? base.pool.probeTimeoutMs,
      maxTasksPerHandle: vars.DROVER_MAX_TASKS_PER_DRIVER ?? base.pool.maxTasksPerHandle,
      warmupCount: vars.DROVER_WARMUP_COUNT ?? base.pool.warmupCount,
    },
    task: {
      defaultTimeoutMs: vars.DROVER_TASK_TIMEOUT_MS ?? base.task.defaultTimeoutMs,
      defaultMaxRetries: vars.DROVER_TASK_MAX_RETRIES ?? base.task.defaultMaxRetries,
    },
    manager: {
      drainTimeoutMs: vars.DROVER_DRAIN_TIMEOUT_MS ?? base.manager.drainTimeoutMs,
    },
    browser: {
      headless: vars.DROVER_HEADLESS ?? base.browser.headless,
      executablePath: vars.DROVER_CHROME_PATH ?? base.browser.executablePath,
      userAgent: vars.DROVER_USER_AGENT ?? base.browser.userAgent,
      viewportWidth: base.browser.viewportWidth,
      viewportHeight: base.browser.viewportHeight,
      args: vars.DROVER_CHROME_ARGS ? [...base.browser.args, ...vars.DROVER_CHROME_ARGS] : [...base.browser.args],
      profileDir: vars.DROVER_PROFILE_DIR ?? base.browser.profileDir,
      launchTimeoutMs: vars.DROVER_LAUNCH_TIMEOUT_MS ?? base.browser.launchTimeoutMs,
    },
    logging: {
      level: vars.LOG_LEVEL ?? base.logging.level,
      pretty: vars.LOG_PRETTY ?? base.logging.pretty,
    },
  };

  const config = mergeConfig(fromEnv, overrides);

  if (config.pool.warmupCount > config.pool.maxSize) {
    throw Errors.configurationError(
      `Warm-up count (${config.pool.warmupCount}) exceeds pool size (${config.pool.maxSize})`
    );
  }

  return config;
}

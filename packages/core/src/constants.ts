/**
 * Constants for the Drover session manager
 */

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  /** Per-task budget when the task does not set one */
  TASK: 30_000, // 30 seconds

  /** How long lease() waits for a free driver */
  LEASE: 10_000, // 10 seconds

  /** Liveness probe round-trip */
  HEALTH_PROBE: 2_000, // 2 seconds

  /** Best-effort drain of in-flight tasks on shutdown */
  DRAIN: 15_000, // 15 seconds

  /** Browser launch */
  LAUNCH: 30_000, // 30 seconds
} as const;

/**
 * Retry budget defaults
 */
export const MAX_RETRIES = {
  /** Crash retries per task */
  TASK: 1,

  /** Upper bound accepted from callers */
  TASK_LIMIT: 5,
} as const;

/**
 * Driver pool defaults
 */
export const DRIVER_POOL = {
  /** Maximum concurrent browser sessions */
  MAX_SIZE: 4,

  /** Idle sessions older than this are closed instead of reused */
  IDLE_EXPIRY: 300_000, // 5 minutes

  /** Periodic sweep and idle probe interval */
  HEALTH_CHECK_INTERVAL: 30_000, // 30 seconds

  /** Tasks served before a session is recycled (0 = never) */
  MAX_TASKS_PER_HANDLE: 0,

  /** Sessions launched on start */
  WARMUP_COUNT: 0,
} as const;

/**
 * Browser defaults for containerised headless Chrome
 */
export const BROWSER = {
  VIEWPORT_WIDTH: 1920,
  VIEWPORT_HEIGHT: 1080,
  USER_AGENT:
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
} as const;

/**
 * Chrome flags needed to run inside a container
 */
export const CHROME_ARGS: readonly string[] = [
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-software-rasterizer',
  '--disable-extensions',
  '--disable-background-timer-throttling',
  '--disable-backgrounding-occluded-windows',
  '--disable-renderer-backgrounding',
  '--disable-features=TranslateUI',
  '--disable-ipc-flooding-protection',
];

/**
 * Usual install locations of Chrome and Chromium, checked in order
 */
export const CHROME_BINARY_PATHS: readonly string[] = [
  '/usr/bin/google-chrome',
  '/usr/bin/chromium-browser',
  '/usr/bin/chromium',
  '/usr/local/bin/chrome',
];

/**
 * ID prefixes
 */
export const ID_PREFIX = {
  DRIVER: 'drv',
  TASK: 'task',
  LEASE: 'lease',
} as const;

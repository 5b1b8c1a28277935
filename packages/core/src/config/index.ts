/**
 * Configuration exports for @drover/core
 */

export { DEFAULT_CONFIG, EnvSchema, loadConfig, mergeConfig } from './config.js';
export type {
  LogLevel,
  PoolSettings,
  TaskSettings,
  ManagerSettings,
  BrowserSettings,
  LoggingSettings,
  DroverConfig,
  ConfigOverrides,
} from './config.js';

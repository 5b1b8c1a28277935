/**
 * @drover/session-manager
 *
 * Public entry point of the Drover browser session manager.
 */

// Types
export type {
  ManagerState,
  OutcomeClass,
  SessionManagerConfig,
  SessionManagerOptions,
  CreateSessionManagerOptions,
  HealthReport,
  ManagerEventType,
  ManagerEvent,
  ManagerEventHandler,
} from './types.js';

export { OUTCOME_CLASS_BY_CODE } from './types.js';

// Manager
export { SessionManager, DEFAULT_MANAGER_CONFIG, classifyOutcome } from './manager.js';
export { createSessionManager } from './create.js';

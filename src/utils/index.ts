/**
 * Utility exports for persona-relay
 */

// Logger
export {
  createLogger,
  createChildLogger,
  createContextLogger,
  getLogger,
  setLogger,
  logEvent,
  logTiming,
  LOG_LEVELS,
  type LogLevel,
  type LoggerConfig,
} from "./logger.js";

// Errors
export {
  RelayError,
  AdvisoryError,
  LockedError,
  IncompleteRequirementsError,
  NotConfirmedError,
  AlreadyProcessingError,
  NotReadyError,
  InvalidValueError,
  InvalidStateError,
  NotFoundError,
  SynthesisError,
  TimeoutError,
  HandoffFailedError,
  PersistenceError,
  AnalyticsError,
  ConfigError,
  isRelayError,
  isAdvisoryError,
  formatError,
  withErrorHandling,
  toError,
  type RelayErrorCode,
  type AdvisoryCode,
  type HandoffDirection,
  type ConfigIssue,
  type ValidationIssue,
} from "./errors.js";

// Validation
export { safeValidate, createIdGenerator } from "./validation.js";

// Async
export { sleep, deferred, createMutex, type Mutex } from "./async.js";

// Strings
export { titleCase, renderTemplate, bulletList } from "./strings.js";

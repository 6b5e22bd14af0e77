// Sync engine
export { stateFilePath, SyncEngine } from "./engine.js";
// Errors
export {
  AbortError,
  ApiError,
  AuthenticationError,
  ConfigError,
  errorMessage,
  FatalApiError,
  isAbortError,
  isNetworkError,
  RetriableApiError,
} from "./errors.js";
export type { ApiErrorDetails } from "./errors.js";
// Logger
export { ConsoleLogger, createLogger } from "./logger.js";
// Output writer
export { createOutputWriter, FileOutputWriter } from "./output.js";
// Rate limiter
export {
  createRateLimiter,
  parseRetryAfter,
  SlidingWindowRateLimiter,
} from "./rate-limiter.js";
export type { RetryOptions } from "./retry.js";
// Retry helper
export { backoffDelay, isRetryableError, withRetry } from "./retry.js";
export { Semaphore } from "./semaphore.js";
// State management
export { CursorTracker, readPersistedState, StateManager } from "./state.js";
export type { CursorTrackerOptions } from "./state.js";
export type {
  Adapter,
  AdapterRegistration,
  AdapterState,
  Logger,
  OutputWriter,
  PersistedState,
  RateLimiter,
  RateLimiterConfig,
  SyncContext,
  SyncEngineConfig,
  SyncError,
  SyncMode,
  SyncResult,
} from "./types.js";

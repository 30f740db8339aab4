/**
 * Tool agent runtime
 *
 * The request lifecycle core shared by every tool agent, plus the ambient
 * logger, error classes and configuration.
 */

export * from "./lifecycle";
export { RateLimiter, type AdmissionResult, type RateLimiterConfig } from "./rate-limiter";
export { ResultCache, type CacheEntry } from "./result-cache";
export { RequestQueue } from "./request-queue";
export { ExecutionSlot, Dispatcher, type InFlight, type DispatchOutcome } from "./execution-slot";
export { cacheKey, canonicalJson } from "./cache-key";
export { monotonicClock, ManualClock, type Clock } from "./clock";
export {
  LifecycleConfigSchema,
  resolveLifecycleConfig,
  describeIssues,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_RATE_LIMIT_WINDOW_MS,
  DEFAULT_RATE_LIMIT_MAX,
  type LifecycleConfig,
  type LifecycleConfigInput,
} from "./config";
export {
  OperationalError,
  isOperationalError,
  formatReason,
  type OperationalErrorCode,
} from "./errors";
export {
  getLogger,
  toError,
  isLogLevel,
  StructuredLogger,
  type Logger,
  type LogLevel,
  type LogContext,
  type LogEntry,
} from "./logger";

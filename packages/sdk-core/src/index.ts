/**
 * FlagTier SDK Core
 *
 * Transport-agnostic building blocks shared by FlagTier SDKs:
 * - Deterministic bucketing
 * - TTL cache layer over a pluggable store
 * - Bounded stats event queue with retrying flush
 * - Retry with exponential backoff
 * - Request deduplication
 * - Error taxonomy and result-or-default recovery
 * - Logging
 */

// Bucketing
export { bucket, BUCKET_COUNT } from "./bucket";

// Cache
export {
  MemoryCache,
  DefinitionCache,
  DEFAULT_CACHE_CONFIG,
  cacheKey,
} from "./cache";
export type {
  CacheStore,
  CacheConfig,
  CacheStats,
  CacheEntity,
} from "./cache";

// Stats events
export { EventQueue, DEFAULT_EVENT_QUEUE_CONFIG } from "./events";
export type {
  EventQueueConfig,
  BatchSender,
  QueuedEvent,
  StatsEventPayload,
  StatsEventType,
  FlagEvaluationEvent,
  ExperimentExposureEvent,
  ConversionEvent,
  CustomStatsEvent,
} from "./events";

// Retry
export { retryWithBackoff, calculateBackoff, DEFAULT_RETRY_CONFIG } from "./retry";
export type { RetryConfig, RetryResult } from "./retry";

// Dedup
export { RequestDeduplicator } from "./dedup";

// Emitter
export { SimpleEventEmitter } from "./emitter";

// Errors
export {
  FlagTierError,
  ConfigurationError,
  ValidationError,
  NotFoundError,
  NetworkError,
  ErrorCategory,
  ErrorCode,
  isFlagTierError,
  isConfigurationError,
  isValidationError,
  isNotFoundError,
  isNetworkError,
  isRetryable,
  classifyError,
  withDefault,
} from "./errors";

// Logging
export { createConsoleLogger, silentLogger, LOGGER_PREFIX } from "./logger";
export type { Logger, LogLevel } from "./logger";

// Types
export type {
  ServedValue,
  RequestContext,
  FlagContext,
  ExperimentContext,
  LanguageTarget,
  CountryTarget,
  Targeting,
  FlagType,
  FlagDefinition,
  ExperimentStatus,
  Variation,
  TrafficAllocation,
  ExperimentMetric,
  ExperimentDefinition,
  FlagReason,
  FlagResult,
  VariantAssignment,
  ConfigValues,
  ConfigVersion,
  ConversionData,
  TrackEventData,
  HealthStatus,
} from "./types";

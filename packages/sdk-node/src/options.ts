import {
  ConfigurationError,
  DEFAULT_CACHE_CONFIG,
  DEFAULT_EVENT_QUEUE_CONFIG,
  ErrorCode,
  createConsoleLogger,
} from "@flagtier/sdk-core";
import type {
  CacheConfig,
  CacheStore,
  ConfigVersion,
  EventQueueConfig,
  Logger,
} from "@flagtier/sdk-core";
import type { Transport } from "./http";

export interface ClientOptions {
  platform: string;
  environment: string;
  /** Full API base URL. Mutually exclusive with tenantSubdomain. */
  apiUrl?: string;
  /** Resolves to https://{tenant}.flagtier.io */
  tenantSubdomain?: string;
  apiKey?: string;
  configVersion?: ConfigVersion; // Default: "stable"
  timeout?: number; // Request timeout in ms (default: 30000)
  cache?: Partial<CacheConfig>;
  stats?: Partial<EventQueueConfig>;
  /** Backing store for the cache layer (default: in-process MemoryCache) */
  cacheStore?: CacheStore;
  /** Replaces the fetch transport, mostly for tests */
  transport?: Transport;
  logger?: Logger;
}

export interface ResolvedOptions {
  platform: string;
  environment: string;
  baseUrl: string;
  apiKey?: string;
  configVersion: ConfigVersion;
  timeout: number;
  cache: CacheConfig;
  stats: EventQueueConfig;
  logger: Logger;
}

export const DEFAULT_TIMEOUT = 30000;

export function tenantUrl(subdomain: string): string {
  return `https://${subdomain}.flagtier.io`;
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}

function requireText(value: string | undefined, option: string): string {
  if (value === undefined || isBlank(value)) {
    throw new ConfigurationError(
      `${option} is required`,
      ErrorCode.CONFIG_MISSING_OPTION,
      { option },
    );
  }
  return value;
}

function requirePositive(value: number, option: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(
      `${option} must be a positive number, got ${value}`,
      ErrorCode.CONFIG_INVALID_VALUE,
      { option },
    );
  }
  return value;
}

function resolveBaseUrl(options: ClientOptions): string {
  const hasUrl = !isBlank(options.apiUrl);
  const hasTenant = !isBlank(options.tenantSubdomain);

  if (hasUrl && hasTenant) {
    throw new ConfigurationError(
      "Specify either apiUrl or tenantSubdomain, not both",
      ErrorCode.CONFIG_CONFLICTING_OPTION,
      { option: "apiUrl" },
    );
  }
  if (options.apiUrl !== undefined && hasUrl) {
    return options.apiUrl;
  }
  if (options.tenantSubdomain !== undefined && hasTenant) {
    return tenantUrl(options.tenantSubdomain);
  }
  throw new ConfigurationError(
    "Either apiUrl or tenantSubdomain is required",
    ErrorCode.CONFIG_MISSING_OPTION,
    { option: "apiUrl" },
  );
}

/**
 * Validate client options and fill in defaults.
 * Raises ConfigurationError; nothing here is recoverable.
 */
export function resolveOptions(options: ClientOptions): ResolvedOptions {
  const platform = requireText(options.platform, "platform");
  const environment = requireText(options.environment, "environment");
  const baseUrl = resolveBaseUrl(options);

  const cache: CacheConfig = { ...DEFAULT_CACHE_CONFIG, ...options.cache };
  const stats: EventQueueConfig = {
    ...DEFAULT_EVENT_QUEUE_CONFIG,
    ...options.stats,
  };

  requirePositive(cache.ttl, "cache.ttl");
  requirePositive(stats.batchSize, "stats.batchSize");
  requirePositive(stats.maxQueueSize, "stats.maxQueueSize");
  requirePositive(stats.maxRetries, "stats.maxRetries");
  if (!Number.isFinite(stats.baseDelayMs) || stats.baseDelayMs < 0) {
    throw new ConfigurationError(
      `stats.baseDelayMs must not be negative, got ${stats.baseDelayMs}`,
      ErrorCode.CONFIG_INVALID_VALUE,
      { option: "stats.baseDelayMs" },
    );
  }

  return {
    platform,
    environment,
    baseUrl,
    apiKey: options.apiKey,
    configVersion: options.configVersion ?? "stable",
    timeout: requirePositive(options.timeout ?? DEFAULT_TIMEOUT, "timeout"),
    cache,
    stats,
    logger: options.logger ?? createConsoleLogger(),
  };
}

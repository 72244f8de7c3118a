import { EventEmitter } from "events";

import {
  DefinitionCache,
  EventQueue,
  MemoryCache,
  cacheKey,
  withDefault,
} from "@flagtier/sdk-core";
import type {
  CacheStats,
  ConfigValues,
  ConfigVersion,
  ConversionData,
  ExperimentContext,
  ExperimentDefinition,
  FlagContext,
  FlagDefinition,
  FlagResult,
  FlagTierError,
  HealthStatus,
  Logger,
  QueuedEvent,
  TrackEventData,
  VariantAssignment,
} from "@flagtier/sdk-core";
import { assignVariation, evaluateFlag } from "./evaluate";
import { HttpClient } from "./http";
import type { Transport } from "./http";
import {
  ConfigLoader,
  ExperimentLoader,
  FlagLoader,
  environmentPath,
} from "./loaders";
import { resolveOptions } from "./options";
import type { ClientOptions, ResolvedOptions } from "./options";
import { healthSchema, parsePayload } from "./schemas";

// Re-export from sdk-core
export * from "@flagtier/sdk-core";
export { evaluateFlag, assignVariation, isWithinSchedule } from "./evaluate";
export { HttpClient } from "./http";
export type { Transport, HttpClientConfig } from "./http";
export {
  ConfigLoader,
  FlagLoader,
  ExperimentLoader,
  environmentPath,
  configPath,
} from "./loaders";
export type { LoaderScope, LoaderDependencies } from "./loaders";
export { resolveOptions, tenantUrl, DEFAULT_TIMEOUT } from "./options";
export type { ClientOptions, ResolvedOptions } from "./options";

export const HEALTH_PATH = "/api/v1/health";

function kindOf(value: unknown): string {
  return Array.isArray(value) ? "array" : typeof value;
}

function isSameKind<T>(value: unknown, reference: T): value is T {
  return kindOf(value) === kindOf(reference);
}

/**
 * Client for FlagTier remote config, feature flags and experiments.
 *
 * Definitions are loaded lazily and cached; every evaluation runs
 * locally. Evaluations and exposures are buffered and posted in batches.
 *
 * Events:
 * - `stats-flushed` `{ eventsSent, attempts }`
 * - `stats-dropped` `{ eventCount, attempts, error }`
 * - `cache-hit` / `cache-miss` `{ key }`
 */
export class FlagTierClient extends EventEmitter {
  private readonly options: ResolvedOptions;
  private readonly logger: Logger;
  private readonly transport: Transport;
  private readonly cache: DefinitionCache;
  private readonly configs: ConfigLoader;
  private readonly flags: FlagLoader;
  private readonly experiments: ExperimentLoader;
  private readonly stats: EventQueue;

  constructor(options: ClientOptions) {
    super();
    this.options = resolveOptions(options);
    this.logger = this.options.logger;

    this.transport =
      options.transport ??
      new HttpClient({
        baseUrl: this.options.baseUrl,
        apiKey: this.options.apiKey,
        timeout: this.options.timeout,
      });

    this.cache = new DefinitionCache(
      options.cacheStore ?? new MemoryCache(),
      this.options.cache,
    );

    const deps = {
      transport: this.transport,
      cache: this.cache,
      scope: {
        platform: this.options.platform,
        environment: this.options.environment,
      },
      logger: this.logger,
    };
    this.configs = new ConfigLoader(deps);
    this.flags = new FlagLoader(deps);
    this.experiments = new ExperimentLoader(deps);

    const statsPath = `${environmentPath(deps.scope)}/stats/events`;
    this.stats = new EventQueue(
      async (events: QueuedEvent[]) => {
        await this.transport.post(statsPath, { events });
      },
      this.options.stats,
      this.logger,
    );

    // Forward cache events
    this.cache.on("cache-hit", (data) => this.emit("cache-hit", data));
    this.cache.on("cache-miss", (data) => this.emit("cache-miss", data));

    // Forward stats events
    this.stats.on("flush", (data) => this.emit("stats-flushed", data));
    this.stats.on("dropped", (data) => this.emit("stats-dropped", data));
  }

  // ==================== Remote config ====================

  /**
   * All config values for a version (default: the configured version)
   */
  getConfig(
    version: ConfigVersion = this.options.configVersion,
  ): Promise<ConfigValues> {
    return this.configs.load(version);
  }

  getAllConfigs(): Promise<ConfigValues> {
    return this.getConfig();
  }

  /**
   * Single config value. Missing keys, null values, load failures and
   * values of a different type than `defaultValue` all resolve to
   * `defaultValue`.
   */
  getConfigValue(key: string): Promise<unknown>;
  getConfigValue<T>(key: string, defaultValue: T): Promise<T>;
  getConfigValue(key: string, defaultValue: unknown = null): Promise<unknown> {
    return withDefault(
      async () => {
        const config = await this.getConfig();
        const value = Object.hasOwn(config, key) ? config[key] : undefined;
        if (value === undefined || value === null) {
          return defaultValue;
        }
        if (defaultValue === null || isSameKind(value, defaultValue)) {
          return value;
        }
        this.logger.debug(
          `getConfigValue("${key}"): expected ${kindOf(defaultValue)}, got ${kindOf(value)}`,
        );
        return defaultValue;
      },
      defaultValue,
      (error) => this.warnFallback(`getConfigValue("${key}")`, error),
    );
  }

  // ==================== Feature flags ====================

  getFlags(): Promise<FlagDefinition[]> {
    return this.flags.load();
  }

  /**
   * Evaluate a flag and record the evaluation.
   * Rejects with NotFoundError for unknown keys.
   */
  async getFlag(flagKey: string, context: FlagContext): Promise<FlagResult> {
    const flag = await this.flags.find(flagKey);
    const result = evaluateFlag(flag, context);

    this.stats.enqueue({
      type: "flag_evaluation",
      flagKey,
      value: result.servedValue,
      userId: context.userId,
      country: context.country,
      language: context.language,
    });

    return result;
  }

  /**
   * True when the flag serves A. Any failure resolves to `defaultValue`.
   */
  isFlagEnabled(
    flagKey: string,
    context: FlagContext,
    defaultValue: boolean = false,
  ): Promise<boolean> {
    return withDefault(
      async () => (await this.getFlag(flagKey, context)).servedValue === "A",
      defaultValue,
      (error) => this.warnFallback(`isFlagEnabled("${flagKey}")`, error),
    );
  }

  /**
   * Flag metadata fetched directly, or null on any failure
   */
  getFlagInfo(flagKey: string): Promise<FlagDefinition | null> {
    return withDefault<FlagDefinition | null>(
      () => this.flags.fetchOne(flagKey),
      null,
      (error) => this.logger.debug(`getFlagInfo("${flagKey}"): ${error.message}`),
    );
  }

  // ==================== Experiments ====================

  getExperiments(): Promise<ExperimentDefinition[]> {
    return this.experiments.load();
  }

  /**
   * Assign a variation and record the exposure.
   * Resolves to null when the user is not assigned; rejects with
   * NotFoundError for unknown keys.
   */
  async getVariant(
    experimentKey: string,
    context: ExperimentContext,
  ): Promise<VariantAssignment | null> {
    const assignment = await this.getVariantWithoutTracking(
      experimentKey,
      context,
    );

    if (assignment) {
      this.stats.enqueue({
        type: "experiment_exposure",
        experimentKey,
        variationKey: assignment.variationKey,
        userId: context.userId,
      });
    }

    return assignment;
  }

  /**
   * Same assignment as getVariant, without an exposure event
   */
  async getVariantWithoutTracking(
    experimentKey: string,
    context: ExperimentContext,
  ): Promise<VariantAssignment | null> {
    const experiment = await this.experiments.find(experimentKey);
    return assignVariation(experiment, context);
  }

  /**
   * Experiment metadata fetched directly, or null on any failure
   */
  getExperimentInfo(experimentKey: string): Promise<ExperimentDefinition | null> {
    return withDefault<ExperimentDefinition | null>(
      () => this.experiments.fetchOne(experimentKey),
      null,
      (error) =>
        this.logger.debug(`getExperimentInfo("${experimentKey}"): ${error.message}`),
    );
  }

  /**
   * Record a conversion against the user's assigned variation.
   * Nothing is recorded when the user has no assignment.
   */
  async trackConversion(
    experimentKey: string,
    context: ExperimentContext,
    data: ConversionData,
  ): Promise<void> {
    // Re-deriving the assignment must not count as another exposure
    const assignment = await this.getVariantWithoutTracking(
      experimentKey,
      context,
    );
    if (!assignment) {
      return;
    }

    this.stats.enqueue({
      type: "conversion",
      experimentKey,
      metricName: data.metricName,
      variationKey: assignment.variationKey,
      userId: context.userId,
      value: data.value,
    });
  }

  /**
   * Record a custom event
   */
  trackEvent(
    eventName: string,
    context: FlagContext,
    data: TrackEventData = {},
  ): void {
    this.stats.enqueue({
      type: "custom_event",
      eventName,
      userId: context.userId,
      country: context.country,
      language: context.language,
      ...data,
    });
  }

  // ==================== Cache & lifecycle ====================

  /**
   * Drop cached definitions for all three tiers and load them again,
   * including every config version loaded so far
   */
  async refresh(): Promise<void> {
    const { platform, environment, configVersion } = this.options;
    const versions = new Set([configVersion, ...this.configs.loadedVersions()]);

    for (const version of versions) {
      await this.cache.invalidate(this.configs.cacheKeyFor(version));
    }
    await this.cache.invalidate(cacheKey("flags", platform, environment));
    await this.cache.invalidate(cacheKey("experiments", platform, environment));

    for (const version of versions) {
      await this.getConfig(version);
    }
    await this.getFlags();
    await this.getExperiments();
  }

  clearCache(): Promise<void> {
    return this.cache.invalidateAll();
  }

  getCacheStats(): CacheStats & { hitRate: number } {
    return { ...this.cache.getStats(), hitRate: this.cache.getHitRate() };
  }

  /**
   * Post buffered stats events. Never rejects; a batch that still fails
   * after the configured retries stays buffered.
   */
  flushStats(): Promise<void> {
    return this.stats.flush();
  }

  getPendingEventCount(): number {
    return this.stats.size();
  }

  async checkConnection(): Promise<HealthStatus> {
    const body = await this.transport.get(HEALTH_PATH);
    return parsePayload(healthSchema, body, "health");
  }

  /**
   * Flush pending stats and detach every listener
   */
  async close(): Promise<void> {
    await this.flushStats();

    this.cache.removeAllListeners();
    this.stats.removeAllListeners();
    this.removeAllListeners();
  }

  private warnFallback(operation: string, error: FlagTierError): void {
    this.logger.warn(`${operation} returned the default value: ${error.message}`);
  }
}

// Default export for convenience
export default FlagTierClient;

/**
 * Cache-first loaders for the three definition tiers.
 *
 * A load reads the namespaced cache entry and only falls back to the
 * transport on a miss. Transport and validation errors propagate; the
 * loaders never retry.
 */

import type { z } from "zod";
import {
  NotFoundError,
  RequestDeduplicator,
  cacheKey,
  silentLogger,
} from "@flagtier/sdk-core";
import type {
  CacheEntity,
  ConfigValues,
  ConfigVersion,
  DefinitionCache,
  ExperimentDefinition,
  FlagDefinition,
  Logger,
} from "@flagtier/sdk-core";
import type { Transport } from "./http";
import {
  configValuesSchema,
  experimentListSchema,
  experimentSchema,
  flagListSchema,
  flagSchema,
  parsePayload,
  unwrapData,
} from "./schemas";

export interface LoaderScope {
  platform: string;
  environment: string;
}

export interface LoaderDependencies {
  transport: Transport;
  cache: DefinitionCache;
  scope: LoaderScope;
  logger?: Logger;
}

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * `/api/v1/platforms/{platform}/environments/{environment}`
 */
export function environmentPath(scope: LoaderScope): string {
  return `/api/v1/platforms/${encodeURIComponent(scope.platform)}/environments/${encodeURIComponent(scope.environment)}`;
}

/**
 * Config endpoint for a version. `stable` is the environment's active
 * parameter set; `latest` and explicit ids read the version history.
 */
export function configPath(scope: LoaderScope, version: ConfigVersion): string {
  const base = environmentPath(scope);
  switch (version) {
    case "stable":
      return `${base}/configs`;
    case "latest":
      return `${base}/versions/latest`;
    default:
      return `${base}/versions/${encodeURIComponent(version)}`;
  }
}

abstract class DefinitionLoader<T> {
  protected readonly transport: Transport;
  protected readonly scope: LoaderScope;
  private readonly cache: DefinitionCache;
  private readonly logger: Logger;
  private readonly dedup = new RequestDeduplicator<T>();

  constructor(deps: LoaderDependencies) {
    this.transport = deps.transport;
    this.cache = deps.cache;
    this.scope = deps.scope;
    this.logger = deps.logger ?? silentLogger;
  }

  protected keyFor(entity: CacheEntity, version?: string): string {
    return cacheKey(
      entity,
      this.scope.platform,
      this.scope.environment,
      version,
    );
  }

  /**
   * Cached raw payloads are validated again on the way out. An entry that
   * no longer matches the schema is evicted and refetched.
   */
  protected loadCached(
    key: string,
    path: string,
    schema: Schema<T>,
    empty: unknown,
    description: string,
  ): Promise<T> {
    return this.dedup.dedupe(key, async () => {
      const cached = await this.cache.read(key);
      if (cached !== undefined) {
        const result = schema.safeParse(cached);
        if (result.success) {
          return result.data;
        }
        this.logger.warn(`Discarding malformed cached ${description} at ${key}`);
        await this.cache.invalidate(key);
      }

      this.logger.debug(`Cache miss for ${key}, fetching ${path}`);
      const data = unwrapData(await this.transport.get(path), path) ?? empty;
      const value = parsePayload(schema, data, description);
      await this.cache.write(key, data);
      return value;
    });
  }
}

/**
 * Remote config values, one cache entry per version
 */
export class ConfigLoader extends DefinitionLoader<ConfigValues> {
  private readonly versions = new Set<ConfigVersion>();

  async load(version: ConfigVersion = "stable"): Promise<ConfigValues> {
    const values = await this.loadCached(
      this.keyFor("config", version),
      configPath(this.scope, version),
      configValuesSchema,
      {},
      "config",
    );
    this.versions.add(version);
    return values;
  }

  /** Versions loaded so far, in first-load order */
  loadedVersions(): ConfigVersion[] {
    return [...this.versions];
  }

  cacheKeyFor(version: ConfigVersion): string {
    return this.keyFor("config", version);
  }
}

export class FlagLoader extends DefinitionLoader<FlagDefinition[]> {
  load(): Promise<FlagDefinition[]> {
    return this.loadCached(
      this.keyFor("flags"),
      `${environmentPath(this.scope)}/flags`,
      flagListSchema,
      [],
      "flag list",
    );
  }

  async find(flagKey: string): Promise<FlagDefinition> {
    const flags = await this.load();
    const flag = flags.find((candidate) => candidate.flagKey === flagKey);
    if (!flag) {
      throw NotFoundError.flag(flagKey);
    }
    return flag;
  }

  /**
   * Single flag straight from the service, bypassing the cache
   */
  async fetchOne(flagKey: string): Promise<FlagDefinition> {
    const path = `${environmentPath(this.scope)}/flags/${encodeURIComponent(flagKey)}`;
    const data = unwrapData(await this.transport.get(path), path);
    if (data === undefined) {
      throw NotFoundError.flag(flagKey);
    }
    return parsePayload(flagSchema, data, "flag");
  }
}

export class ExperimentLoader extends DefinitionLoader<ExperimentDefinition[]> {
  load(): Promise<ExperimentDefinition[]> {
    return this.loadCached(
      this.keyFor("experiments"),
      `${environmentPath(this.scope)}/experiments`,
      experimentListSchema,
      [],
      "experiment list",
    );
  }

  async find(experimentKey: string): Promise<ExperimentDefinition> {
    const experiments = await this.load();
    const experiment = experiments.find(
      (candidate) => candidate.experimentKey === experimentKey,
    );
    if (!experiment) {
      throw NotFoundError.experiment(experimentKey);
    }
    return experiment;
  }

  /**
   * Single experiment straight from the service, bypassing the cache
   */
  async fetchOne(experimentKey: string): Promise<ExperimentDefinition> {
    const path = `${environmentPath(this.scope)}/experiments/${encodeURIComponent(experimentKey)}`;
    const data = unwrapData(await this.transport.get(path), path);
    if (data === undefined) {
      throw NotFoundError.experiment(experimentKey);
    }
    return parsePayload(experimentSchema, data, "experiment");
  }
}

import { SimpleEventEmitter } from "./emitter";

type MaybePromise<T> = T | Promise<T>;

/**
 * Pluggable key-value store with TTL semantics.
 * Implementations own expiry once a value is written.
 */
export interface CacheStore {
  get(key: string): MaybePromise<unknown>;
  set(key: string, value: unknown, ttlSeconds: number): MaybePromise<void>;
  delete(key: string): MaybePromise<void>;
  clear(): MaybePromise<void>;
}

interface MemoryEntry {
  value: unknown;
  expiresAt: number;
}

/**
 * In-process CacheStore. A read past expiry evicts the entry.
 */
export class MemoryCache implements CacheStore {
  private entries: Map<string, MemoryEntry> = new Map();

  get(key: string): unknown {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: unknown, ttlSeconds: number): void {
    this.entries.set(key, {
      value,
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

export type CacheEntity = "config" | "flags" | "experiments";

/**
 * Namespace key `{entity}:{platform}:{environment}[:{version}]`
 */
export function cacheKey(
  entity: CacheEntity,
  platform: string,
  environment: string,
  version?: string,
): string {
  const base = `${entity}:${platform}:${environment}`;
  return version === undefined ? base : `${base}:${version}`;
}

/**
 * Cache configuration
 */
export interface CacheConfig {
  /** When false, reads always miss and writes are dropped (default: true) */
  enabled: boolean;
  /** Time-to-live in seconds (default: 300 = 5min) */
  ttl: number;
}

export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  enabled: true,
  ttl: 300,
};

export interface CacheStats {
  hits: number;
  misses: number;
}

type DefinitionCacheEvents = {
  "cache-hit": { key: string };
  "cache-miss": { key: string };
};

/**
 * TTL-scoped memoization of remote definitions over an injected CacheStore
 */
export class DefinitionCache extends SimpleEventEmitter<DefinitionCacheEvents> {
  private readonly store: CacheStore;
  private readonly config: CacheConfig;
  private stats: CacheStats = { hits: 0, misses: 0 };

  constructor(store: CacheStore, config: Partial<CacheConfig> = {}) {
    super();
    this.store = store;
    this.config = { ...DEFAULT_CACHE_CONFIG, ...config };
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  get ttl(): number {
    return this.config.ttl;
  }

  async read(key: string): Promise<unknown> {
    if (!this.config.enabled) {
      return undefined;
    }

    const value = await this.store.get(key);
    if (value === undefined || value === null) {
      this.stats.misses++;
      this.emit("cache-miss", { key });
      return undefined;
    }

    this.stats.hits++;
    this.emit("cache-hit", { key });
    return value;
  }

  async write(
    key: string,
    value: unknown,
    ttlSeconds: number = this.config.ttl,
  ): Promise<void> {
    if (!this.config.enabled) {
      return;
    }
    await this.store.set(key, value, ttlSeconds);
  }

  async invalidate(key: string): Promise<void> {
    await this.store.delete(key);
  }

  async invalidateAll(): Promise<void> {
    await this.store.clear();
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }

  getHitRate(): number {
    const total = this.stats.hits + this.stats.misses;
    if (total === 0) return 0;
    return this.stats.hits / total;
  }
}

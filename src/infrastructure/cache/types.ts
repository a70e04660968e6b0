/**
 * Tiered Cache Types
 *
 * Type definitions shared by the local (L1) and shared (L2) tiers,
 * the key lock registry and the cache orchestrator.
 */

/**
 * Opaque cache key. Compared by exact string equality, never normalized.
 */
export type CacheKey = string;

/**
 * Label attached to entries for bulk invalidation
 */
export type CacheTag = string;

/**
 * Expiration kinds
 */
export enum ExpirationKind {
  /** Fixed deadline from write time */
  ABSOLUTE = 'absolute',
  /** Deadline renewed on every successful read */
  SLIDING = 'sliding',
}

/**
 * Expiration attached to a cache write
 */
export interface ExpirationSpec {
  kind: ExpirationKind;
  durationMs: number;
}

/**
 * Tier identifiers
 */
export type TierName = 'local' | 'shared';

/**
 * A tier hit together with the time left before the tier drops it
 */
export interface TierEntry<T> {
  value: T;
  remainingMs: number;
}

/**
 * Capability set implemented by both cache tiers.
 * `undefined` from `get` means absent.
 */
export interface TierStore {
  readonly tier: TierName;
  get<T>(key: CacheKey): Promise<T | undefined>;
  getEntry<T>(key: CacheKey): Promise<TierEntry<T> | undefined>;
  set<T>(
    key: CacheKey,
    value: T,
    expiration: ExpirationSpec,
    tags?: readonly CacheTag[]
  ): Promise<void>;
  remove(key: CacheKey): Promise<void>;
  removeByTag(tag: CacheTag): Promise<void>;
}

/**
 * Authoritative data source for a key.
 * Throws NotFoundError (or resolves undefined) when the item does not exist.
 */
export type OriginLoader<T> = (key: CacheKey) => Promise<T>;

/**
 * Layer that served a read
 */
export enum CacheLayer {
  L1_MEMORY = 'L1_MEMORY',
  L2_REDIS = 'L2_REDIS',
  ORIGIN = 'ORIGIN',
}

/**
 * Read result with layer info
 */
export interface CacheResult<T> {
  value: T;
  layer: CacheLayer;
  latencyMs: number;
}

/**
 * Per-call options for CacheOrchestrator.get
 */
export interface GetOptions {
  /** Tags attached to the entry when the loader runs */
  tags?: readonly CacheTag[];
  /** Overrides the configured lock wait bound */
  lockTimeoutMs?: number;
  /** Overrides the configured loader bound (0 = unbounded) */
  loaderTimeoutMs?: number;
}

/**
 * Cache hit/miss statistics for a single tier
 */
export interface CacheStats {
  hits: number;
  misses: number;
  sets: number;
  deletes: number;
  invalidations: number;
  size: number;
  hitRate: number;
}

/**
 * Invalidation broadcast between instances
 */
export interface CacheInvalidationEvent {
  kind: 'key' | 'tag';
  target: string;
  source: string;
  timestamp: number;
  reason?: string;
}

/**
 * Pub/sub transport for invalidation events
 */
export interface InvalidationBus {
  publish(event: CacheInvalidationEvent): Promise<void>;
  /** Returns an unsubscribe function */
  subscribe(handler: (event: CacheInvalidationEvent) => void): () => void;
}

/**
 * Configuration for L1 cache
 */
export interface L1CacheConfig {
  /** Maximum entries before LRU eviction (default: 10000) */
  maxEntries: number;
  /** Sweep interval for expired entries in milliseconds (default: 30000) */
  cleanupIntervalMs: number;
  /** Enable statistics tracking (default: true) */
  enableStats: boolean;
}

/**
 * Configuration for L2 cache
 */
export interface L2CacheConfig {
  /** Prefix for every Redis key written by this cache (default: 'cache') */
  keyPrefix: string;
  /** Pub/sub channel for invalidation events */
  invalidationChannel: string;
  /** Tag set size that triggers pruning of expired members on write */
  tagIndexPruneThreshold: number;
  /** Enable statistics tracking (default: true) */
  enableStats: boolean;
}

/**
 * Configuration for the key lock registry
 */
export interface KeyLockRegistryConfig {
  /** Wait bound applied when acquire() is called without one */
  defaultTimeoutMs: number;
  /** Queue length per key before acquire() is rejected */
  maxWaitersPerKey: number;
}

/**
 * Configuration for the orchestrator
 */
export interface CacheOrchestratorConfig {
  lockTimeoutMs: number;
  /** 0 disables the loader bound */
  loaderTimeoutMs: number;
  /** Local TTL as a fraction of the shared TTL, in (0, 1] */
  localTtlRatio: number;
  maxLocalTtlMs?: number;
  negativeCaching: boolean;
  negativeTtlMs: number;
  /** Identifies this process on the invalidation channel */
  instanceId: string;
}

export const DEFAULT_L1_CONFIG: L1CacheConfig = {
  maxEntries: 10_000,
  cleanupIntervalMs: 30_000, // 30 seconds
  enableStats: true,
};

export const DEFAULT_L2_CONFIG: L2CacheConfig = {
  keyPrefix: 'cache',
  invalidationChannel: 'cache:invalidation',
  tagIndexPruneThreshold: 1_000,
  enableStats: true,
};

export const DEFAULT_LOCK_CONFIG: KeyLockRegistryConfig = {
  defaultTimeoutMs: 5_000,
  maxWaitersPerKey: 1_000,
};

export const DEFAULT_ORCHESTRATOR_CONFIG: Omit<CacheOrchestratorConfig, 'instanceId'> = {
  lockTimeoutMs: 5_000,
  loaderTimeoutMs: 10_000,
  localTtlRatio: 0.2, // 60s local for a 5 minute shared TTL
  negativeCaching: false,
  negativeTtlMs: 30_000,
};

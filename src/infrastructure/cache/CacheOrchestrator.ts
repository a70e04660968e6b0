/**
 * Cache Orchestrator
 *
 * Stampede-safe cache-aside over a local (L1) and a shared (L2) tier.
 *
 * Read path:   L1 -> L2 (warm L1) -> key lock -> L1 -> L2 -> origin
 * Write path:  origin -> L2 -> L1
 * Invalidation: L1 + L2, then broadcast so other instances drop their L1
 *
 * At most one loader call per key is in flight in this process. Callers
 * that queue behind it are served by the second lookup once the lock is
 * handed to them. Tier failures degrade to misses; loader failures are
 * never cached.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { CacheMetrics } from './CacheMetrics.js';
import {
  LoadError,
  NotFoundError,
  TierUnavailableError,
  TimeoutError,
} from './errors.js';
import { assertValidExpiration, ExpirationPolicy } from './ExpirationPolicy.js';
import { KeyLockRegistry, type KeyLockRegistryStats, type LockHandle } from './KeyLockRegistry.js';
import type {
  CacheInvalidationEvent,
  CacheKey,
  CacheOrchestratorConfig,
  CacheResult,
  CacheTag,
  ExpirationSpec,
  GetOptions,
  InvalidationBus,
  OriginLoader,
  TierEntry,
  TierStore,
} from './types.js';
import { CacheLayer, DEFAULT_ORCHESTRATOR_CONFIG } from './types.js';

const NEGATIVE_MARKER = '__cacheNegative';

/**
 * Stored in both tiers when negative caching is on and the origin has no value
 */
export interface NegativeEntry {
  [NEGATIVE_MARKER]: true;
}

const NEGATIVE_ENTRY: NegativeEntry = { [NEGATIVE_MARKER]: true };

export function isNegativeEntry(value: unknown): value is NegativeEntry {
  return typeof value === 'object' && value !== null && NEGATIVE_MARKER in value && value[NEGATIVE_MARKER] === true;
}

export interface CacheOrchestratorDeps {
  local: TierStore;
  shared: TierStore;
  /** Enables cross-instance L1 invalidation */
  invalidationBus?: InvalidationBus;
  locks?: KeyLockRegistry;
  metrics?: CacheMetrics;
}

export interface CacheOrchestratorStats {
  originLoads: number;
  originFailures: number;
  notFound: number;
  /** Callers served by the second lookup under the lock */
  coalesced: number;
  tierErrors: number;
  locks: KeyLockRegistryStats;
}

interface TierHit<T> {
  value: T;
  layer: CacheLayer;
}

export class CacheOrchestrator {
  private readonly log: Logger;
  private readonly config: CacheOrchestratorConfig;
  private readonly local: TierStore;
  private readonly shared: TierStore;
  private readonly bus: InvalidationBus | undefined;
  private readonly locks: KeyLockRegistry;
  private readonly metrics: CacheMetrics;
  private readonly expiration: ExpirationPolicy;
  private unsubscribe: (() => void) | null = null;

  // Statistics
  private originLoads = 0;
  private originFailures = 0;
  private notFound = 0;
  private coalesced = 0;
  private tierErrors = 0;

  constructor(deps: CacheOrchestratorDeps, logger: Logger, config: Partial<CacheOrchestratorConfig> = {}) {
    this.log = logger.child({ component: 'CacheOrchestrator' });
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, instanceId: randomUUID(), ...config };
    this.expiration = new ExpirationPolicy({
      localTtlRatio: this.config.localTtlRatio,
      maxLocalTtlMs: this.config.maxLocalTtlMs,
    });

    this.local = deps.local;
    this.shared = deps.shared;
    this.bus = deps.invalidationBus;
    this.locks = deps.locks ?? new KeyLockRegistry(logger, { defaultTimeoutMs: this.config.lockTimeoutMs });
    this.metrics = deps.metrics ?? new CacheMetrics();
    this.metrics.bindKeyLockCount(() => this.locks.size);

    this.log.info(
      {
        instanceId: this.config.instanceId,
        lockTimeoutMs: this.config.lockTimeoutMs,
        loaderTimeoutMs: this.config.loaderTimeoutMs,
        localTtlRatio: this.config.localTtlRatio,
        negativeCaching: this.config.negativeCaching,
      },
      'Cache orchestrator initialized'
    );
  }

  get instanceId(): string {
    return this.config.instanceId;
  }

  /**
   * Read through both tiers, loading from the origin at most once per key
   */
  async get<T>(
    key: CacheKey,
    loader: OriginLoader<T>,
    expiration: ExpirationSpec,
    options: GetOptions = {}
  ): Promise<T> {
    const result = await this.getResult(key, loader, expiration, options);
    return result.value;
  }

  /**
   * Same as get(), with the serving layer and latency
   */
  async getResult<T>(
    key: CacheKey,
    loader: OriginLoader<T>,
    expiration: ExpirationSpec,
    options: GetOptions = {}
  ): Promise<CacheResult<T>> {
    assertValidExpiration(expiration);
    const start = Date.now();
    const tags = options.tags ?? [];
    const localExpiration = this.expiration.deriveLocal(expiration);

    const cached = await this.lookup<T>(key, localExpiration, tags);
    if (cached) {
      return this.served(key, cached, start);
    }

    const handle = await this.acquire(key, options.lockTimeoutMs ?? this.config.lockTimeoutMs);
    try {
      // Another caller may have filled either tier while we waited
      const rechecked = await this.lookup<T>(key, localExpiration, tags);
      if (rechecked) {
        this.coalesced++;
        this.metrics.recordCoalesced();
        return this.served(key, rechecked, start);
      }

      this.metrics.recordMiss();
      const value = await this.load(key, loader, options.loaderTimeoutMs ?? this.config.loaderTimeoutMs, tags);
      await this.populate(key, value, expiration, localExpiration, tags);

      return { value, layer: CacheLayer.ORIGIN, latencyMs: Date.now() - start };
    } finally {
      handle.release();
    }
  }

  /**
   * Remove a key from both tiers, typically after the origin was updated
   */
  async invalidate(key: CacheKey, reason?: string): Promise<void> {
    await this.removeEverywhere('remove', (tier) => tier.remove(key));
    this.metrics.recordInvalidation('key');
    await this.broadcast({ kind: 'key', target: key, reason });
    this.log.debug({ key, reason }, 'Key invalidated');
  }

  /**
   * Remove every key carrying the tag from both tiers. Takes no key locks.
   */
  async invalidateTag(tag: CacheTag, reason?: string): Promise<void> {
    await this.removeEverywhere('removeByTag', (tier) => tier.removeByTag(tag));
    this.metrics.recordInvalidation('tag');
    await this.broadcast({ kind: 'tag', target: tag, reason });
    this.log.debug({ tag, reason }, 'Tag invalidated');
  }

  /**
   * Apply invalidations published by other instances to the local tier
   */
  startInvalidationListener(): void {
    if (!this.bus) {
      this.log.warn('No invalidation bus configured, skipping invalidation listener');
      return;
    }
    if (this.unsubscribe) {
      return;
    }

    this.unsubscribe = this.bus.subscribe((event) => {
      if (event.source === this.config.instanceId) {
        return;
      }
      void this.applyRemoteInvalidation(event);
    });
  }

  getStats(): CacheOrchestratorStats {
    return {
      originLoads: this.originLoads,
      originFailures: this.originFailures,
      notFound: this.notFound,
      coalesced: this.coalesced,
      tierErrors: this.tierErrors,
      locks: this.locks.getStats(),
    };
  }

  /**
   * Stop listening for invalidations and reject pending lock waiters
   */
  destroy(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
    this.locks.close();
    this.log.info('Cache orchestrator destroyed');
  }

  private async acquire(key: CacheKey, timeoutMs: number): Promise<LockHandle> {
    const waitStart = Date.now();
    try {
      const handle = await this.locks.acquire(key, { timeoutMs });
      this.metrics.recordLockWait(Date.now() - waitStart);
      return handle;
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.metrics.recordLockTimeout();
        this.log.warn({ key, timeoutMs }, 'Gave up waiting for key lock');
      }
      throw error;
    }
  }

  /**
   * L1, then L2 with L1 backfill. Tier failures count as misses.
   */
  private async lookup<T>(
    key: CacheKey,
    localExpiration: ExpirationSpec,
    tags: readonly CacheTag[]
  ): Promise<TierHit<T> | null> {
    const local = await this.safeGet<T>(this.local, key);
    if (local !== undefined) {
      return { value: local.value, layer: CacheLayer.L1_MEMORY };
    }

    const shared = await this.safeGet<T>(this.shared, key);
    if (shared === undefined) {
      return null;
    }

    const localWindow = isNegativeEntry(shared.value)
      ? this.expiration.deriveLocal(this.expiration.negative(this.config.negativeTtlMs))
      : localExpiration;
    const backfill = this.expiration.backfill(localWindow, shared.remainingMs);
    if (backfill) {
      await this.safeSet(this.local, key, shared.value, backfill, tags);
      this.log.debug({ key, durationMs: backfill.durationMs }, 'L1 warmed from L2 hit');
    }

    return { value: shared.value, layer: CacheLayer.L2_REDIS };
  }

  private served<T>(key: CacheKey, hit: TierHit<T>, start: number): CacheResult<T> {
    if (isNegativeEntry(hit.value)) {
      this.log.debug({ key, layer: hit.layer }, 'Negative cache hit');
      throw new NotFoundError(key);
    }

    this.metrics.recordHit(hit.layer);
    return { value: hit.value, layer: hit.layer, latencyMs: Date.now() - start };
  }

  private async load<T>(
    key: CacheKey,
    loader: OriginLoader<T>,
    timeoutMs: number,
    tags: readonly CacheTag[]
  ): Promise<T> {
    const start = Date.now();
    this.originLoads++;

    try {
      const value = await this.runLoader(key, loader, timeoutMs);
      if (value === undefined) {
        throw new NotFoundError(key);
      }
      this.metrics.recordOriginLoad('success', Date.now() - start);
      return value;
    } catch (error) {
      const elapsedMs = Date.now() - start;

      if (error instanceof NotFoundError) {
        this.notFound++;
        this.metrics.recordOriginLoad('not_found', elapsedMs);
        await this.cacheNegative(key, tags);
        throw error;
      }

      this.originFailures++;
      if (error instanceof TimeoutError) {
        this.metrics.recordOriginLoad('timeout', elapsedMs);
        this.log.warn({ key, timeoutMs }, 'Origin load timed out');
        throw error;
      }

      this.metrics.recordOriginLoad('error', elapsedMs);
      this.log.warn({ key, error }, 'Origin load failed');
      throw error instanceof LoadError ? error : new LoadError(key, error);
    }
  }

  private async runLoader<T>(key: CacheKey, loader: OriginLoader<T>, timeoutMs: number): Promise<T> {
    if (timeoutMs <= 0) {
      return loader(key);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new TimeoutError(key, timeoutMs, 'loader')), timeoutMs);
    });

    try {
      return await Promise.race([loader(key), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async cacheNegative(key: CacheKey, tags: readonly CacheTag[]): Promise<void> {
    if (!this.config.negativeCaching) {
      return;
    }

    const spec = this.expiration.negative(this.config.negativeTtlMs);
    await this.populate(key, NEGATIVE_ENTRY, spec, this.expiration.deriveLocal(spec), tags);
    this.log.debug({ key, ttlMs: spec.durationMs }, 'Negative entry cached');
  }

  /**
   * Shared first, then local
   */
  private async populate(
    key: CacheKey,
    value: unknown,
    sharedExpiration: ExpirationSpec,
    localExpiration: ExpirationSpec,
    tags: readonly CacheTag[]
  ): Promise<void> {
    await this.safeSet(this.shared, key, value, sharedExpiration, tags);
    await this.safeSet(this.local, key, value, localExpiration, tags);
  }

  private async safeGet<T>(tier: TierStore, key: CacheKey): Promise<TierEntry<T> | undefined> {
    try {
      return await tier.getEntry<T>(key);
    } catch (error) {
      this.recordTierFailure(tier, 'get', error);
      return undefined;
    }
  }

  private async safeSet(
    tier: TierStore,
    key: CacheKey,
    value: unknown,
    expiration: ExpirationSpec,
    tags: readonly CacheTag[]
  ): Promise<void> {
    try {
      await tier.set(key, value, expiration, tags);
    } catch (error) {
      this.recordTierFailure(tier, 'set', error);
    }
  }

  /**
   * Attempt both tiers; rethrow the first failure once both have run
   */
  private async removeEverywhere(operation: string, fn: (tier: TierStore) => Promise<void>): Promise<void> {
    const [localResult, sharedResult] = await Promise.allSettled([fn(this.local), fn(this.shared)]);

    const failures: TierUnavailableError[] = [];
    if (localResult.status === 'rejected') {
      failures.push(this.recordTierFailure(this.local, operation, localResult.reason));
    }
    if (sharedResult.status === 'rejected') {
      failures.push(this.recordTierFailure(this.shared, operation, sharedResult.reason));
    }

    const [first] = failures;
    if (first) {
      throw first;
    }
  }

  private async broadcast(event: Omit<CacheInvalidationEvent, 'source' | 'timestamp'>): Promise<void> {
    if (!this.bus) {
      return;
    }

    try {
      await this.bus.publish({ ...event, source: this.config.instanceId, timestamp: Date.now() });
    } catch (error) {
      this.recordTierFailure(this.shared, 'publish', error);
    }
  }

  private async applyRemoteInvalidation(event: CacheInvalidationEvent): Promise<void> {
    try {
      if (event.kind === 'key') {
        await this.local.remove(event.target);
      } else {
        await this.local.removeByTag(event.target);
      }
      this.metrics.recordInvalidation('remote');
      this.log.debug({ kind: event.kind, target: event.target, source: event.source }, 'L1 invalidated from pub/sub event');
    } catch (error) {
      this.recordTierFailure(this.local, event.kind === 'key' ? 'remove' : 'removeByTag', error);
    }
  }

  private recordTierFailure(tier: TierStore, operation: string, error: unknown): TierUnavailableError {
    const failure = error instanceof TierUnavailableError ? error : new TierUnavailableError(tier.tier, operation, error);
    this.tierErrors++;
    this.metrics.recordTierError(tier.tier, operation);
    this.log.warn({ tier: tier.tier, operation, error: failure.cause ?? failure }, 'Cache tier unavailable, degrading');
    return failure;
  }
}

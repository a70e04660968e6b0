/**
 * L1 In-Memory Cache
 *
 * Per-process local tier with LRU eviction, absolute or sliding
 * expiration per entry, and a tag index for bulk invalidation.
 *
 * Features:
 * - LRU eviction when max entries exceeded
 * - Expiration checked on access, plus a periodic sweep
 * - Tag -> key index kept in step with removal, eviction and expiry
 * - Hit/miss statistics
 */

import type { Logger } from 'pino';
import {
  assertValidExpiration,
  computeDeadline,
  isExpired,
  refreshDeadline,
} from './ExpirationPolicy.js';
import type {
  CacheKey,
  CacheStats,
  CacheTag,
  ExpirationSpec,
  L1CacheConfig,
  TierEntry,
  TierStore,
} from './types.js';
import { DEFAULT_L1_CONFIG } from './types.js';

interface LocalEntry {
  value: unknown;
  expiration: ExpirationSpec;
  expiresAt: number;
  tags: readonly CacheTag[];
}

/**
 * L1 In-Memory Cache with LRU eviction
 */
export class L1Cache implements TierStore {
  readonly tier = 'local' as const;

  private cache: Map<CacheKey, LocalEntry> = new Map();
  private tagIndex: Map<CacheTag, Set<CacheKey>> = new Map();
  private readonly log: Logger;
  private readonly config: L1CacheConfig;
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  // Statistics
  private hits = 0;
  private misses = 0;
  private sets = 0;
  private deletes = 0;
  private invalidations = 0;

  constructor(logger: Logger, config: Partial<L1CacheConfig> = {}) {
    this.log = logger.child({ component: 'L1Cache' });
    this.config = { ...DEFAULT_L1_CONFIG, ...config };

    this.startCleanup();

    this.log.info(
      {
        maxEntries: this.config.maxEntries,
        cleanupIntervalMs: this.config.cleanupIntervalMs,
      },
      'L1 cache initialized'
    );
  }

  async get<T>(key: CacheKey): Promise<T | undefined> {
    return this.read<T>(key);
  }

  async getEntry<T>(key: CacheKey): Promise<TierEntry<T> | undefined> {
    const entry = this.lookup(key);
    if (!entry) {
      return undefined;
    }
    return { value: entry.value as T, remainingMs: entry.expiresAt - Date.now() };
  }

  async set<T>(
    key: CacheKey,
    value: T,
    expiration: ExpirationSpec,
    tags: readonly CacheTag[] = []
  ): Promise<void> {
    this.write(key, value, expiration, tags);
  }

  async remove(key: CacheKey): Promise<void> {
    this.delete(key);
  }

  async removeByTag(tag: CacheTag): Promise<void> {
    this.invalidateByTag(tag);
  }

  /**
   * Synchronous read. Sliding entries get a new deadline on every hit.
   */
  read<T>(key: CacheKey): T | undefined {
    const entry = this.lookup(key);
    // Values are stored type-erased; callers own the key's value type
    return entry ? (entry.value as T) : undefined;
  }

  private lookup(key: CacheKey): LocalEntry | undefined {
    const entry = this.cache.get(key);

    if (!entry) {
      this.recordMiss();
      return undefined;
    }

    const now = Date.now();
    if (isExpired(entry.expiresAt, now)) {
      this.drop(key, entry);
      this.recordMiss();
      this.log.debug({ key }, 'L1 cache entry expired');
      return undefined;
    }

    entry.expiresAt = refreshDeadline(entry.expiration, entry.expiresAt, now);

    // Move to end of Map for LRU tracking (most recently used)
    this.cache.delete(key);
    this.cache.set(key, entry);

    if (this.config.enableStats) {
      this.hits++;
    }
    this.log.debug({ key }, 'L1 cache hit');
    return entry;
  }

  /**
   * Synchronous write. Replaces any previous entry and its tag memberships.
   */
  write<T>(key: CacheKey, value: T, expiration: ExpirationSpec, tags: readonly CacheTag[] = []): void {
    assertValidExpiration(expiration);

    const previous = this.cache.get(key);
    if (previous) {
      this.drop(key, previous);
    } else if (this.cache.size >= this.config.maxEntries) {
      this.evictLRU();
    }

    const uniqueTags = [...new Set(tags)];
    this.cache.set(key, {
      value,
      expiration,
      expiresAt: computeDeadline(expiration, Date.now()),
      tags: uniqueTags,
    });

    for (const tag of uniqueTags) {
      let keys = this.tagIndex.get(tag);
      if (!keys) {
        keys = new Set();
        this.tagIndex.set(tag, keys);
      }
      keys.add(key);
    }

    if (this.config.enableStats) {
      this.sets++;
    }
    this.log.debug({ key, expiration, tags: uniqueTags }, 'L1 cache set');
  }

  delete(key: CacheKey): boolean {
    const entry = this.cache.get(key);
    if (!entry) {
      return false;
    }

    this.drop(key, entry);
    if (this.config.enableStats) {
      this.deletes++;
    }
    return true;
  }

  /**
   * Check if a key exists and is not expired. Does not count as a read.
   */
  has(key: CacheKey): boolean {
    const entry = this.cache.get(key);
    if (!entry) {
      return false;
    }

    if (isExpired(entry.expiresAt, Date.now())) {
      this.drop(key, entry);
      return false;
    }

    return true;
  }

  /**
   * Remove every entry carrying the tag. Returns the number removed.
   */
  invalidateByTag(tag: CacheTag): number {
    const keys = this.tagIndex.get(tag);
    if (!keys) {
      return 0;
    }

    let count = 0;
    for (const key of [...keys]) {
      const entry = this.cache.get(key);
      if (entry) {
        this.drop(key, entry);
        count++;
      }
    }
    this.tagIndex.delete(tag);

    if (this.config.enableStats) {
      this.invalidations += count;
    }

    this.log.debug({ tag, count }, 'L1 cache invalidated by tag');
    return count;
  }

  /**
   * Keys currently indexed under a tag
   */
  keysForTag(tag: CacheTag): CacheKey[] {
    return [...(this.tagIndex.get(tag) ?? [])];
  }

  clear(): void {
    const size = this.cache.size;
    this.cache.clear();
    this.tagIndex.clear();
    this.log.info({ entriesCleared: size }, 'L1 cache cleared');
  }

  get size(): number {
    return this.cache.size;
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      sets: this.sets,
      deletes: this.deletes,
      invalidations: this.invalidations,
      size: this.cache.size,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
    this.sets = 0;
    this.deletes = 0;
    this.invalidations = 0;
  }

  /**
   * Stop the cleanup interval and release resources
   */
  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.cache.clear();
    this.tagIndex.clear();
    this.log.info('L1 cache destroyed');
  }

  /**
   * Remove expired entries. Returns the number removed.
   */
  sweep(): number {
    const now = Date.now();
    let removed = 0;

    for (const [key, entry] of this.cache) {
      if (isExpired(entry.expiresAt, now)) {
        this.drop(key, entry);
        removed++;
      }
    }

    if (removed > 0) {
      this.log.debug({ entriesRemoved: removed }, 'L1 cache cleanup completed');
    }
    return removed;
  }

  private recordMiss(): void {
    if (this.config.enableStats) {
      this.misses++;
    }
  }

  /**
   * Remove an entry and its tag memberships
   */
  private drop(key: CacheKey, entry: LocalEntry): void {
    this.cache.delete(key);
    for (const tag of entry.tags) {
      const keys = this.tagIndex.get(tag);
      if (!keys) {
        continue;
      }
      keys.delete(key);
      if (keys.size === 0) {
        this.tagIndex.delete(tag);
      }
    }
  }

  /**
   * Evict the least recently used entry (first item in Map)
   */
  private evictLRU(): void {
    const first = this.cache.entries().next();
    if (!first.done) {
      const [key, entry] = first.value;
      this.drop(key, entry);
      this.log.debug({ key }, 'L1 cache LRU eviction');
    }
  }

  private startCleanup(): void {
    this.cleanupInterval = setInterval(() => {
      this.sweep();
    }, this.config.cleanupIntervalMs);

    // Don't block process exit
    this.cleanupInterval.unref();
  }
}

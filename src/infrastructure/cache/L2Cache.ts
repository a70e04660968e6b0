/**
 * L2 Redis Cache
 *
 * Shared tier reachable by every instance through the StateManager.
 *
 * Features:
 * - JSON envelope per entry, TTL enforced by Redis (PX)
 * - Sliding entries re-armed with PEXPIRE on every hit
 * - Redis set per tag; expired members pruned lazily
 * - Pub/Sub bus for cross-instance invalidation of L1 tiers
 * - Hit/miss statistics
 *
 * Every Redis failure surfaces as TierUnavailableError; deciding whether
 * that is fatal is left to the caller.
 */

import type { Logger } from 'pino';
import type { SharedStateClient } from '../../services/StateManager.js';
import {
  decodeEntry,
  decodeInvalidationEvent,
  encodeEntry,
  encodeInvalidationEvent,
} from './entry-codec.js';
import { TierUnavailableError } from './errors.js';
import { assertValidExpiration } from './ExpirationPolicy.js';
import type {
  CacheInvalidationEvent,
  CacheKey,
  CacheStats,
  CacheTag,
  ExpirationSpec,
  InvalidationBus,
  L2CacheConfig,
  TierEntry,
  TierStore,
} from './types.js';
import { DEFAULT_L2_CONFIG, ExpirationKind } from './types.js';

export class L2Cache implements TierStore, InvalidationBus {
  readonly tier = 'shared' as const;

  private readonly log: Logger;
  private readonly config: L2CacheConfig;
  private readonly unsubscribers = new Set<() => void>();

  // Statistics (local tracking, not distributed)
  private hits = 0;
  private misses = 0;
  private sets = 0;
  private deletes = 0;
  private invalidations = 0;

  constructor(
    private readonly stateManager: SharedStateClient,
    logger: Logger,
    config: Partial<L2CacheConfig> = {}
  ) {
    this.log = logger.child({ component: 'L2Cache' });
    this.config = { ...DEFAULT_L2_CONFIG, ...config };

    this.log.info(
      {
        keyPrefix: this.config.keyPrefix,
        invalidationChannel: this.config.invalidationChannel,
      },
      'L2 cache initialized'
    );
  }

  buildKey(key: CacheKey): string {
    return `${this.config.keyPrefix}:v:${key}`;
  }

  buildTagKey(tag: CacheTag): string {
    return `${this.config.keyPrefix}:t:${tag}`;
  }

  async get<T>(key: CacheKey): Promise<T | undefined> {
    const entry = await this.getEntry<T>(key);
    return entry?.value;
  }

  /**
   * Read a value with the time Redis will keep it. Sliding entries are
   * renewed to a full window; absolute entries report their PTTL.
   */
  async getEntry<T>(key: CacheKey): Promise<TierEntry<T> | undefined> {
    const fullKey = this.buildKey(key);
    const raw = await this.call('get', () => this.stateManager.get(fullKey));

    if (raw === null) {
      this.recordMiss();
      this.log.debug({ key }, 'L2 cache miss');
      return undefined;
    }

    const entry = decodeEntry(raw);
    if (!entry) {
      this.log.warn({ key }, 'Discarding malformed L2 cache entry');
      await this.call('delete', () => this.stateManager.delete(fullKey));
      this.recordMiss();
      return undefined;
    }

    const durationMs = entry.expiration.durationMs;
    let remainingMs = durationMs;
    if (entry.expiration.kind === ExpirationKind.SLIDING) {
      const renewed = await this.call('touch', () => this.stateManager.pexpire(fullKey, durationMs));
      if (!renewed) {
        // Expired between GET and PEXPIRE
        this.recordMiss();
        return undefined;
      }
    } else {
      const ttl = await this.call('ttl', () => this.stateManager.pttl(fullKey));
      if (ttl === -2 || ttl === 0) {
        // Expired between GET and PTTL
        this.recordMiss();
        return undefined;
      }
      if (ttl > 0) {
        remainingMs = ttl;
      }
    }

    if (this.config.enableStats) {
      this.hits++;
    }
    this.log.debug({ key, remainingMs }, 'L2 cache hit');
    // Values are stored type-erased; callers own the key's value type
    return { value: entry.value as T, remainingMs };
  }

  async set<T>(
    key: CacheKey,
    value: T,
    expiration: ExpirationSpec,
    tags: readonly CacheTag[] = []
  ): Promise<void> {
    assertValidExpiration(expiration);

    const fullKey = this.buildKey(key);
    const uniqueTags = [...new Set(tags)];
    const payload = encodeEntry(value, expiration, uniqueTags);

    // Tags are indexed before the value so a stored value is always reachable by tag
    for (const tag of uniqueTags) {
      await this.call('tag', () => this.stateManager.sadd(this.buildTagKey(tag), key));
    }

    await this.call('set', () => this.stateManager.set(fullKey, payload, expiration.durationMs));

    for (const tag of uniqueTags) {
      const members = await this.call('tag', () => this.stateManager.scard(this.buildTagKey(tag)));
      if (members > this.config.tagIndexPruneThreshold) {
        await this.pruneTag(tag);
      }
    }

    if (this.config.enableStats) {
      this.sets++;
    }
    this.log.debug({ key, expiration, tags: uniqueTags }, 'L2 cache set');
  }

  async remove(key: CacheKey): Promise<void> {
    const removed = await this.call('delete', () => this.stateManager.delete(this.buildKey(key)));
    if (removed > 0 && this.config.enableStats) {
      this.deletes++;
    }
    this.log.debug({ key, removed }, 'L2 cache delete');
  }

  /**
   * Delete every key indexed under the tag, then the index itself.
   * A key tagged concurrently with this call may survive; it stays
   * reachable through its own key.
   */
  async removeByTag(tag: CacheTag): Promise<void> {
    const tagKey = this.buildTagKey(tag);
    const members = await this.call('removeByTag', () => this.stateManager.smembers(tagKey));

    const removed = await this.call('removeByTag', () =>
      this.stateManager.delete(...members.map((member) => this.buildKey(member)), tagKey)
    );

    if (this.config.enableStats) {
      this.invalidations += members.length;
    }
    this.log.debug({ tag, members: members.length, removed }, 'L2 cache invalidated by tag');
  }

  /**
   * Remove tag members whose value key no longer exists. Returns the number pruned.
   */
  async pruneTag(tag: CacheTag): Promise<number> {
    const tagKey = this.buildTagKey(tag);
    const members = await this.call('prune', () => this.stateManager.smembers(tagKey));
    const alive = await this.call('prune', () =>
      this.stateManager.existsMany(members.map((member) => this.buildKey(member)))
    );

    const dead = members.filter((_, index) => !alive[index]);
    if (dead.length > 0) {
      await this.call('prune', () => this.stateManager.srem(tagKey, ...dead));
      this.log.debug({ tag, pruned: dead.length }, 'L2 tag index pruned');
    }
    return dead.length;
  }

  /**
   * Broadcast an invalidation event to every instance
   */
  async publish(event: CacheInvalidationEvent): Promise<void> {
    await this.call('publish', () =>
      this.stateManager.publish(this.config.invalidationChannel, encodeInvalidationEvent(event))
    );
    this.log.debug({ event }, 'L2 cache invalidation broadcast');
  }

  /**
   * Listen for invalidation events. Returns an unsubscribe function.
   */
  subscribe(handler: (event: CacheInvalidationEvent) => void): () => void {
    if (!this.stateManager.isConnected()) {
      this.log.warn('StateManager not connected, skipping invalidation listener');
      return () => undefined;
    }

    const unsubscribe = this.stateManager.subscribe(this.config.invalidationChannel, (message) => {
      const event = decodeInvalidationEvent(message);
      if (!event) {
        this.log.warn({ payload: message }, 'Failed to parse invalidation event');
        return;
      }

      this.log.debug({ event }, 'Received invalidation event');
      handler(event);
    });

    this.unsubscribers.add(unsubscribe);
    this.log.info('Invalidation listener started');

    return () => {
      if (this.unsubscribers.delete(unsubscribe)) {
        unsubscribe();
      }
    };
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      sets: this.sets,
      deletes: this.deletes,
      invalidations: this.invalidations,
      size: -1, // Size not easily available for Redis
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
   * Stop all invalidation listeners
   */
  destroy(): void {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers.clear();
    this.log.info('L2 cache destroyed');
  }

  private recordMiss(): void {
    if (this.config.enableStats) {
      this.misses++;
    }
  }

  private async call<R>(operation: string, fn: () => Promise<R>): Promise<R> {
    try {
      return await fn();
    } catch (error) {
      throw new TierUnavailableError('shared', operation, error);
    }
  }
}

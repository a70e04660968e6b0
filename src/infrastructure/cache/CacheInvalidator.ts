/**
 * Cache Invalidation Service
 *
 * Write-invalidate helper for code that updates the origin: perform the
 * write, then drop the affected keys or tags so the next read reloads.
 * Keeps a bounded history of what was invalidated and why.
 */

import type { Logger } from 'pino';
import type { CacheOrchestrator } from './CacheOrchestrator.js';
import type { CacheKey, CacheTag } from './types.js';

/**
 * Invalidation strategies
 */
export enum InvalidationStrategy {
  /** Delete a single key */
  INVALIDATE = 'invalidate',
  /** Delete every key carrying a tag */
  TAG_INVALIDATE = 'tag_invalidate',
}

/**
 * Invalidation event for tracking
 */
export interface InvalidationRecord {
  timestamp: number;
  target: string;
  strategy: InvalidationStrategy;
  reason: string;
  affectedKeys?: number;
}

export interface OriginWriteTargets {
  keys?: readonly CacheKey[];
  tags?: readonly CacheTag[];
}

export class CacheInvalidator {
  private readonly log: Logger;
  private readonly cache: CacheOrchestrator;
  private readonly history: InvalidationRecord[] = [];
  private readonly maxHistory: number;

  constructor(cache: CacheOrchestrator, logger: Logger, maxHistory: number = 100) {
    this.log = logger.child({ component: 'CacheInvalidator' });
    this.cache = cache;
    this.maxHistory = maxHistory;
  }

  private recordInvalidation(
    target: string,
    strategy: InvalidationStrategy,
    reason: string,
    affectedKeys?: number
  ): void {
    const record: InvalidationRecord = {
      timestamp: Date.now(),
      target,
      strategy,
      reason,
      affectedKeys,
    };

    this.history.push(record);
    if (this.history.length > this.maxHistory) {
      this.history.shift();
    }

    this.log.debug(record, 'Invalidation recorded');
  }

  async invalidateKey(key: CacheKey, reason: string = 'update'): Promise<void> {
    await this.cache.invalidate(key, reason);
    this.recordInvalidation(key, InvalidationStrategy.INVALIDATE, reason, 1);
  }

  async invalidateTag(tag: CacheTag, reason: string = 'update'): Promise<void> {
    await this.cache.invalidateTag(tag, reason);
    this.recordInvalidation(tag, InvalidationStrategy.TAG_INVALIDATE, reason);
  }

  /**
   * Bulk invalidation (e.g., after a batch update)
   */
  async invalidateKeys(keys: readonly CacheKey[], reason: string = 'bulk_update'): Promise<void> {
    await Promise.all(keys.map((key) => this.cache.invalidate(key, reason)));
    this.recordInvalidation(`bulk:${keys.length}_keys`, InvalidationStrategy.INVALIDATE, reason, keys.length);
  }

  /**
   * Run an origin write, then invalidate what it touched.
   * Nothing is invalidated when the write throws. Every key and tag is
   * attempted; the first invalidation failure is rethrown afterwards.
   */
  async afterOriginWrite<T>(
    write: () => Promise<T>,
    targets: OriginWriteTargets,
    reason: string = 'origin_write'
  ): Promise<T> {
    const result = await write();

    const outcomes = await Promise.allSettled([
      ...(targets.keys ?? []).map((key) => this.invalidateKey(key, reason)),
      ...(targets.tags ?? []).map((tag) => this.invalidateTag(tag, reason)),
    ]);
    const failures = outcomes.filter(
      (outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected'
    );
    const [firstFailure] = failures;
    if (firstFailure) {
      this.log.warn(
        { reason, failed: failures.length, attempted: outcomes.length },
        'Invalidation after origin write incomplete'
      );
      throw firstFailure.reason;
    }

    return result;
  }

  getHistory(): InvalidationRecord[] {
    return [...this.history];
  }

  /**
   * Recent invalidation count by reason
   */
  getInvalidationStats(windowMs: number = 60000): Map<string, number> {
    const cutoff = Date.now() - windowMs;
    const stats = new Map<string, number>();

    for (const record of this.history) {
      if (record.timestamp >= cutoff) {
        const count = stats.get(record.reason) ?? 0;
        stats.set(record.reason, count + 1);
      }
    }

    return stats;
  }

  clearHistory(): void {
    this.history.length = 0;
  }
}

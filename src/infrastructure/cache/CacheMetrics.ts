/**
 * Cache Metrics
 *
 * Prometheus-compatible metrics for the tiered cache.
 *
 * Metrics tracked:
 * - {prefix}_cache_hits_total (by layer)
 * - {prefix}_cache_misses_total
 * - {prefix}_origin_loads_total (by outcome)
 * - {prefix}_origin_load_duration_seconds
 * - {prefix}_lock_wait_duration_seconds
 * - {prefix}_lock_timeouts_total
 * - {prefix}_coalesced_requests_total
 * - {prefix}_tier_errors_total (by tier, operation)
 * - {prefix}_invalidations_total (by kind)
 * - {prefix}_key_locks
 */

import { Counter, Gauge, Histogram, Registry } from 'prom-client';
import type { CacheLayer, TierName } from './types.js';

export type OriginLoadOutcome = 'success' | 'error' | 'not_found' | 'timeout';

export interface CacheMetricsOptions {
  /** Registry to register into; a dedicated one is created when omitted */
  registry?: Registry;
  /** Metric name prefix (default: 'cache') */
  prefix?: string;
  /** Reports the number of live key locks at scrape time */
  keyLockCount?: () => number;
}

export class CacheMetrics {
  readonly registry: Registry;

  private readonly hits: Counter<'layer'>;
  private readonly misses: Counter;
  private readonly originLoads: Counter<'outcome'>;
  private readonly originLoadDuration: Histogram;
  private readonly lockWaitDuration: Histogram;
  private readonly lockTimeouts: Counter;
  private readonly coalesced: Counter;
  private readonly tierErrors: Counter<'tier' | 'operation'>;
  private readonly invalidations: Counter<'kind'>;
  private readonly keyLocks: Gauge;
  private keyLockCount: (() => number) | undefined;

  constructor(options: CacheMetricsOptions = {}) {
    this.registry = options.registry ?? new Registry();
    this.keyLockCount = options.keyLockCount;
    const prefix = options.prefix ?? 'cache';
    const registers = [this.registry];

    this.hits = new Counter({
      name: `${prefix}_cache_hits_total`,
      help: 'Cache hits by serving layer',
      labelNames: ['layer'] as const,
      registers,
    });

    this.misses = new Counter({
      name: `${prefix}_cache_misses_total`,
      help: 'Reads that missed both tiers and reached the origin',
      registers,
    });

    this.originLoads = new Counter({
      name: `${prefix}_origin_loads_total`,
      help: 'Origin loader invocations by outcome',
      labelNames: ['outcome'] as const,
      registers,
    });

    this.originLoadDuration = new Histogram({
      name: `${prefix}_origin_load_duration_seconds`,
      help: 'Origin loader duration in seconds',
      buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
      registers,
    });

    this.lockWaitDuration = new Histogram({
      name: `${prefix}_lock_wait_duration_seconds`,
      help: 'Time spent waiting for a key lock in seconds',
      buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
      registers,
    });

    this.lockTimeouts = new Counter({
      name: `${prefix}_lock_timeouts_total`,
      help: 'Key lock waits that exceeded their bound',
      registers,
    });

    this.coalesced = new Counter({
      name: `${prefix}_coalesced_requests_total`,
      help: 'Callers served from a tier after waiting on a key lock',
      registers,
    });

    this.tierErrors = new Counter({
      name: `${prefix}_tier_errors_total`,
      help: 'Tier store failures treated as misses or surfaced on invalidation',
      labelNames: ['tier', 'operation'] as const,
      registers,
    });

    this.invalidations = new Counter({
      name: `${prefix}_invalidations_total`,
      help: 'Invalidations by kind',
      labelNames: ['kind'] as const,
      registers,
    });

    const readKeyLocks = (): number => this.keyLockCount?.() ?? 0;
    this.keyLocks = new Gauge({
      name: `${prefix}_key_locks`,
      help: 'Keys with a live lock entry',
      registers,
      collect() {
        this.set(readKeyLocks());
      },
    });
  }

  /**
   * Attach the lock count source after construction
   */
  bindKeyLockCount(source: () => number): void {
    this.keyLockCount = source;
  }

  recordHit(layer: CacheLayer): void {
    this.hits.inc({ layer });
  }

  recordMiss(): void {
    this.misses.inc();
  }

  recordOriginLoad(outcome: OriginLoadOutcome, durationMs: number): void {
    this.originLoads.inc({ outcome });
    this.originLoadDuration.observe(durationMs / 1000);
  }

  recordLockWait(durationMs: number): void {
    this.lockWaitDuration.observe(durationMs / 1000);
  }

  recordLockTimeout(): void {
    this.lockTimeouts.inc();
  }

  recordCoalesced(): void {
    this.coalesced.inc();
  }

  recordTierError(tier: TierName, operation: string): void {
    this.tierErrors.inc({ tier, operation });
  }

  recordInvalidation(kind: 'key' | 'tag' | 'remote'): void {
    this.invalidations.inc({ kind });
  }

  /**
   * Current value of the key lock gauge (runs its collect hook)
   */
  async keyLockGaugeValue(): Promise<number> {
    const metric = await this.keyLocks.get();
    return metric.values[0]?.value ?? 0;
  }

  /**
   * Prometheus exposition format
   */
  async toPrometheusFormat(): Promise<string> {
    return this.registry.metrics();
  }
}

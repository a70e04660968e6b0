/**
 * Expiration Policy
 *
 * Deadline arithmetic for absolute and sliding expiration, plus the
 * derivation of the local-tier expiration from the shared-tier one.
 * Tier stores call the pure helpers; the orchestrator owns an instance
 * configured with the local/shared TTL ratio.
 */

import { InvalidExpirationError } from './errors.js';
import { ExpirationKind, type ExpirationSpec } from './types.js';

/**
 * Local expiration derivation settings
 */
export interface ExpirationPolicyConfig {
  /** Local TTL as a fraction of the shared TTL, in (0, 1] */
  localTtlRatio: number;
  /** Upper bound on any local TTL */
  maxLocalTtlMs?: number;
}

/**
 * Throw unless the expiration carries a positive finite duration
 */
export function assertValidExpiration(spec: ExpirationSpec): void {
  if (!Number.isFinite(spec.durationMs) || spec.durationMs <= 0) {
    throw new InvalidExpirationError(spec.durationMs);
  }
}

/**
 * Deadline of an entry written (or, for sliding entries, read) at `now`
 */
export function computeDeadline(spec: ExpirationSpec, now: number): number {
  return now + spec.durationMs;
}

/**
 * Deadline after a successful read. Absolute deadlines never move.
 */
export function refreshDeadline(spec: ExpirationSpec, currentDeadline: number, now: number): number {
  return spec.kind === ExpirationKind.SLIDING ? computeDeadline(spec, now) : currentDeadline;
}

export function isExpired(deadline: number, now: number): boolean {
  return now >= deadline;
}

/**
 * Computes effective expirations for cache writes
 */
export class ExpirationPolicy {
  private readonly config: ExpirationPolicyConfig;

  constructor(config: ExpirationPolicyConfig) {
    if (!(config.localTtlRatio > 0 && config.localTtlRatio <= 1)) {
      throw new RangeError(`localTtlRatio must be in (0, 1], got ${config.localTtlRatio}`);
    }
    this.config = config;
  }

  static absolute(durationMs: number): ExpirationSpec {
    return { kind: ExpirationKind.ABSOLUTE, durationMs };
  }

  static sliding(durationMs: number): ExpirationSpec {
    return { kind: ExpirationKind.SLIDING, durationMs };
  }

  /**
   * Local expiration for an entry copied from the shared tier with
   * `remainingMs` left there. An absolute copy ends no later than the
   * original; null when nothing remains.
   */
  backfill(local: ExpirationSpec, remainingMs: number): ExpirationSpec | null {
    if (local.kind === ExpirationKind.SLIDING) {
      return local;
    }
    const durationMs = Math.min(local.durationMs, Math.floor(remainingMs));
    return durationMs >= 1 ? { kind: local.kind, durationMs } : null;
  }

  /**
   * Local-tier expiration for an entry written to the shared tier with `shared`.
   * Same kind, shorter window: round(duration * ratio), clamped to [1, duration].
   */
  deriveLocal(shared: ExpirationSpec): ExpirationSpec {
    assertValidExpiration(shared);

    let durationMs = Math.round(shared.durationMs * this.config.localTtlRatio);
    if (this.config.maxLocalTtlMs !== undefined) {
      durationMs = Math.min(durationMs, this.config.maxLocalTtlMs);
    }
    durationMs = Math.min(Math.max(durationMs, 1), shared.durationMs);

    return { kind: shared.kind, durationMs };
  }

  /**
   * Expiration for a negative ("not found") entry
   */
  negative(ttlMs: number): ExpirationSpec {
    const spec = ExpirationPolicy.absolute(ttlMs);
    assertValidExpiration(spec);
    return spec;
  }
}

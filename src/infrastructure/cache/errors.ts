/**
 * Cache Error Hierarchy
 *
 * All errors extend CacheError with an error code and a recoverable flag.
 *
 * Code categories:
 * - TIER_*: Tier store errors (1xxx)
 * - LOAD_* / NOT_FOUND: Origin errors (2xxx)
 * - *_TIMEOUT / LOCK_*: Coordination errors (3xxx)
 * - INVALID_*: Caller input errors (4xxx)
 * - LOCK_INVARIANT: Programming errors (9xxx)
 */

import type { CacheKey, TierName } from './types.js';

export const CacheErrorCodes = {
  TIER_UNAVAILABLE: 'E1001',
  LOAD_FAILED: 'E2001',
  NOT_FOUND: 'E2002',
  TIMEOUT: 'E3001',
  LOCK_QUEUE_FULL: 'E3002',
  LOCK_REGISTRY_CLOSED: 'E3003',
  INVALID_EXPIRATION: 'E4001',
  LOCK_INVARIANT: 'E9001',
} as const;

export type CacheErrorCode = (typeof CacheErrorCodes)[keyof typeof CacheErrorCodes];

/**
 * Base error class for all cache errors
 */
export class CacheError extends Error {
  /** Error code for programmatic handling */
  readonly code: CacheErrorCode;

  /** Whether a retry by the caller may succeed */
  readonly recoverable: boolean;

  constructor(
    message: string,
    options: {
      code: CacheErrorCode;
      recoverable?: boolean;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options.cause });
    this.name = 'CacheError';
    this.code = options.code;
    this.recoverable = options.recoverable ?? false;
  }
}

/**
 * A tier store could not be reached or returned an error
 */
export class TierUnavailableError extends CacheError {
  constructor(
    readonly tier: TierName,
    readonly operation: string,
    cause?: unknown
  ) {
    super(`${tier} tier unavailable during ${operation}`, {
      code: CacheErrorCodes.TIER_UNAVAILABLE,
      recoverable: true,
      cause,
    });
    this.name = 'TierUnavailableError';
  }
}

/**
 * The origin loader failed. Never cached.
 */
export class LoadError extends CacheError {
  constructor(
    readonly key: CacheKey,
    cause?: unknown
  ) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Origin load failed for key "${key}"${detail}`, {
      code: CacheErrorCodes.LOAD_FAILED,
      recoverable: true,
      cause,
    });
    this.name = 'LoadError';
  }
}

/**
 * The origin has no item for the key. Loaders throw this to signal absence.
 */
export class NotFoundError extends CacheError {
  constructor(readonly key: CacheKey) {
    super(`No origin value for key "${key}"`, { code: CacheErrorCodes.NOT_FOUND });
    this.name = 'NotFoundError';
  }
}

/**
 * A lock wait or loader call exceeded its bound
 */
export class TimeoutError extends CacheError {
  constructor(
    readonly key: CacheKey,
    readonly timeoutMs: number,
    readonly phase: 'lock' | 'loader'
  ) {
    super(`${phase === 'lock' ? 'Lock acquisition' : 'Origin load'} timed out after ${timeoutMs}ms for key "${key}"`, {
      code: CacheErrorCodes.TIMEOUT,
      recoverable: true,
    });
    this.name = 'TimeoutError';
  }
}

/**
 * Too many callers already queued on one key
 */
export class LockQueueFullError extends CacheError {
  constructor(
    readonly key: CacheKey,
    readonly maxWaiters: number
  ) {
    super(`Lock queue full for key "${key}": ${maxWaiters} waiters`, {
      code: CacheErrorCodes.LOCK_QUEUE_FULL,
      recoverable: true,
    });
    this.name = 'LockQueueFullError';
  }
}

/**
 * ExpirationSpec rejected before any write
 */
export class InvalidExpirationError extends CacheError {
  constructor(readonly durationMs: number) {
    super(`Expiration duration must be a positive finite number of milliseconds, got ${durationMs}`, {
      code: CacheErrorCodes.INVALID_EXPIRATION,
    });
    this.name = 'InvalidExpirationError';
  }
}

/**
 * Two holders observed for one key. Indicates a bug, never user-recoverable.
 */
export class LockInvariantViolation extends CacheError {
  constructor(
    readonly key: CacheKey,
    detail: string
  ) {
    super(`Lock invariant violated for key "${key}": ${detail}`, {
      code: CacheErrorCodes.LOCK_INVARIANT,
    });
    this.name = 'LockInvariantViolation';
  }
}

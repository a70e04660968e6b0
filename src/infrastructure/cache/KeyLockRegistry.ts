/**
 * Key Lock Registry
 *
 * One exclusive lock per cache key, created on first use and reclaimed
 * as soon as it has neither a holder nor waiters. Waiters are queued
 * FIFO and suspended on a promise; every wait is bounded.
 *
 * All map mutations (get-or-create, hand-off, reclamation) run
 * synchronously between awaits, so they are atomic with respect to
 * other callers. Locks for different keys share nothing but the map.
 *
 * @example
 * ```typescript
 * const handle = await registry.acquire('user:42', { timeoutMs: 2000 });
 * try {
 *   await refresh();
 * } finally {
 *   handle.release();
 * }
 * ```
 */

import type { Logger } from 'pino';
import {
  CacheError,
  CacheErrorCodes,
  LockInvariantViolation,
  LockQueueFullError,
  TimeoutError,
} from './errors.js';
import type { CacheKey, KeyLockRegistryConfig } from './types.js';
import { DEFAULT_LOCK_CONFIG } from './types.js';

/**
 * Handle returned when acquiring a lock
 */
export interface LockHandle {
  readonly id: number;
  readonly key: CacheKey;
  readonly acquiredAt: number;
  /** Idempotent */
  release(): void;
}

export interface AcquireOptions {
  timeoutMs?: number;
}

export interface KeyLockRegistryStats {
  /** Keys with a live lock entry */
  size: number;
  held: number;
  waiting: number;
  acquired: number;
  released: number;
  timeouts: number;
  reclaimed: number;
}

interface Waiter {
  resolve: (handle: LockHandle) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

interface KeyLock {
  holder: KeyLockHandle | null;
  waiters: Waiter[];
}

class KeyLockHandle implements LockHandle {
  private released = false;

  constructor(
    private readonly registry: KeyLockRegistry,
    readonly id: number,
    readonly key: CacheKey,
    readonly acquiredAt: number
  ) {}

  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    this.registry.releaseHandle(this);
  }
}

export class KeyLockRegistry {
  private readonly locks = new Map<CacheKey, KeyLock>();
  private readonly log: Logger;
  private readonly config: KeyLockRegistryConfig;
  private nextId = 0;
  private closed = false;

  // Statistics
  private acquired = 0;
  private released = 0;
  private timeouts = 0;
  private reclaimed = 0;

  constructor(logger: Logger, config: Partial<KeyLockRegistryConfig> = {}) {
    this.log = logger.child({ component: 'KeyLockRegistry' });
    this.config = { ...DEFAULT_LOCK_CONFIG, ...config };
  }

  /**
   * Wait for the key's lock. Rejects with TimeoutError once the bound passes;
   * a timed-out caller never held the lock.
   */
  async acquire(key: CacheKey, options: AcquireOptions = {}): Promise<LockHandle> {
    if (this.closed) {
      throw new CacheError('Key lock registry is closed', {
        code: CacheErrorCodes.LOCK_REGISTRY_CLOSED,
      });
    }

    const timeoutMs = options.timeoutMs ?? this.config.defaultTimeoutMs;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new RangeError(`Lock timeout must be a positive finite number, got ${timeoutMs}`);
    }

    let lock = this.locks.get(key);
    if (!lock) {
      lock = { holder: null, waiters: [] };
      this.locks.set(key, lock);
    }

    if (lock.holder === null && lock.waiters.length === 0) {
      return this.grant(key, lock);
    }

    if (lock.waiters.length >= this.config.maxWaitersPerKey) {
      throw new LockQueueFullError(key, this.config.maxWaitersPerKey);
    }

    const queued = lock;
    return new Promise<LockHandle>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, timer: null };

      waiter.timer = setTimeout(() => {
        this.expireWaiter(key, queued, waiter);
        reject(new TimeoutError(key, timeoutMs, 'lock'));
      }, timeoutMs);

      queued.waiters.push(waiter);
      this.log.debug({ key, waiters: queued.waiters.length }, 'Waiting for key lock');
    });
  }

  /**
   * Run `fn` while holding the key's lock; the lock is released on every exit path
   */
  async withLock<T>(key: CacheKey, fn: () => Promise<T>, options: AcquireOptions = {}): Promise<T> {
    const handle = await this.acquire(key, options);
    try {
      return await fn();
    } finally {
      handle.release();
    }
  }

  /**
   * Called by LockHandle.release()
   */
  releaseHandle(handle: KeyLockHandle): void {
    const lock = this.locks.get(handle.key);
    if (!lock || lock.holder !== handle) {
      throw new LockInvariantViolation(handle.key, `handle ${handle.id} released but is not the holder`);
    }

    lock.holder = null;
    this.released++;

    const next = lock.waiters.shift();
    if (next) {
      if (next.timer) {
        clearTimeout(next.timer);
      }
      next.resolve(this.grant(handle.key, lock));
      return;
    }

    this.reclaim(handle.key, lock);
  }

  isLocked(key: CacheKey): boolean {
    return this.locks.get(key)?.holder != null;
  }

  getQueueLength(key: CacheKey): number {
    return this.locks.get(key)?.waiters.length ?? 0;
  }

  /**
   * Number of keys with a live lock entry
   */
  get size(): number {
    return this.locks.size;
  }

  getStats(): KeyLockRegistryStats {
    let held = 0;
    let waiting = 0;
    for (const lock of this.locks.values()) {
      if (lock.holder) {
        held++;
      }
      waiting += lock.waiters.length;
    }

    return {
      size: this.locks.size,
      held,
      waiting,
      acquired: this.acquired,
      released: this.released,
      timeouts: this.timeouts,
      reclaimed: this.reclaimed,
    };
  }

  /**
   * Reject every waiter and refuse new acquisitions. Current holders may still release.
   */
  close(): void {
    this.closed = true;
    for (const [key, lock] of this.locks) {
      const waiters = lock.waiters.splice(0);
      for (const waiter of waiters) {
        if (waiter.timer) {
          clearTimeout(waiter.timer);
        }
        waiter.reject(
          new CacheError('Key lock registry is closed', {
            code: CacheErrorCodes.LOCK_REGISTRY_CLOSED,
          })
        );
      }
      this.reclaim(key, lock);
    }
    this.log.info('Key lock registry closed');
  }

  private grant(key: CacheKey, lock: KeyLock): KeyLockHandle {
    if (lock.holder !== null) {
      throw new LockInvariantViolation(key, `lock already held by handle ${lock.holder.id}`);
    }

    const handle = new KeyLockHandle(this, ++this.nextId, key, Date.now());
    lock.holder = handle;
    this.acquired++;
    return handle;
  }

  private expireWaiter(key: CacheKey, lock: KeyLock, waiter: Waiter): void {
    const index = lock.waiters.indexOf(waiter);
    if (index !== -1) {
      lock.waiters.splice(index, 1);
    }
    this.timeouts++;
    this.log.warn({ key, waiters: lock.waiters.length }, 'Key lock wait timed out');
    this.reclaim(key, lock);
  }

  /**
   * Drop an idle lock, but only if the map still points at this instance
   */
  private reclaim(key: CacheKey, lock: KeyLock): void {
    if (lock.holder === null && lock.waiters.length === 0 && this.locks.get(key) === lock) {
      this.locks.delete(key);
      this.reclaimed++;
    }
  }
}

/**
 * Tiered Cache Module
 *
 * Exports the caching infrastructure:
 * - L1 in-memory tier with LRU eviction and tag index
 * - L2 Redis tier with pub/sub invalidation
 * - Per-key lock registry
 * - Stampede-safe cache-aside orchestrator
 * - Invalidation helper, metrics, errors and types
 */

// Types
export type {
  CacheKey,
  CacheTag,
  ExpirationSpec,
  TierName,
  TierEntry,
  TierStore,
  OriginLoader,
  CacheResult,
  GetOptions,
  CacheStats,
  CacheInvalidationEvent,
  InvalidationBus,
  L1CacheConfig,
  L2CacheConfig,
  KeyLockRegistryConfig,
  CacheOrchestratorConfig,
} from './types.js';

export {
  ExpirationKind,
  CacheLayer,
  DEFAULT_L1_CONFIG,
  DEFAULT_L2_CONFIG,
  DEFAULT_LOCK_CONFIG,
  DEFAULT_ORCHESTRATOR_CONFIG,
} from './types.js';

// Errors
export {
  CacheError,
  CacheErrorCodes,
  type CacheErrorCode,
  TierUnavailableError,
  LoadError,
  NotFoundError,
  TimeoutError,
  LockQueueFullError,
  InvalidExpirationError,
  LockInvariantViolation,
} from './errors.js';

// Expiration
export {
  ExpirationPolicy,
  type ExpirationPolicyConfig,
  assertValidExpiration,
  computeDeadline,
  refreshDeadline,
  isExpired,
} from './ExpirationPolicy.js';

// Locks
export {
  KeyLockRegistry,
  type LockHandle,
  type AcquireOptions,
  type KeyLockRegistryStats,
} from './KeyLockRegistry.js';

// Tiers
export { L1Cache } from './L1Cache.js';
export { L2Cache } from './L2Cache.js';

// Orchestration
export {
  CacheOrchestrator,
  isNegativeEntry,
  type NegativeEntry,
  type CacheOrchestratorDeps,
  type CacheOrchestratorStats,
} from './CacheOrchestrator.js';

// Invalidation
export {
  CacheInvalidator,
  InvalidationStrategy,
  type InvalidationRecord,
  type OriginWriteTargets,
} from './CacheInvalidator.js';

// Metrics
export { CacheMetrics, type CacheMetricsOptions, type OriginLoadOutcome } from './CacheMetrics.js';

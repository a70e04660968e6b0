/**
 * Wires the tiered cache from configuration: Redis connection, both
 * tiers, the lock registry, metrics, the orchestrator and the
 * invalidation helper. The returned close() tears all of it down.
 */

import type { Logger } from 'pino';
import type { Registry } from 'prom-client';
import { getConfig, type Config } from './config.js';
import {
  CacheInvalidator,
  CacheMetrics,
  CacheOrchestrator,
  KeyLockRegistry,
  L1Cache,
  L2Cache,
} from './infrastructure/cache/index.js';
import { StateManager, type SharedStateClient } from './services/StateManager.js';
import { createLogger } from './utils/logger.js';

export interface TieredCacheOptions {
  config?: Config;
  logger?: Logger;
  /** Pre-connected shared state client; a StateManager is created and connected when omitted */
  stateClient?: SharedStateClient;
  /** Prometheus registry to register cache metrics into */
  registry?: Registry;
  /** Defaults to a random UUID */
  instanceId?: string;
}

export interface TieredCache {
  orchestrator: CacheOrchestrator;
  invalidator: CacheInvalidator;
  metrics: CacheMetrics;
  local: L1Cache;
  shared: L2Cache;
  close(): Promise<void>;
}

export async function createTieredCache(options: TieredCacheOptions = {}): Promise<TieredCache> {
  const config = options.config ?? getConfig();
  const logger = options.logger ?? createLogger(config);
  const log = logger.child({ component: 'TieredCache' });

  let ownedStateManager: StateManager | null = null;
  let stateClient = options.stateClient;
  if (!stateClient) {
    ownedStateManager = new StateManager(config.redisUrl, logger);
    await ownedStateManager.connect();
    stateClient = ownedStateManager;
  }

  const local = new L1Cache(logger, {
    maxEntries: config.l1MaxEntries,
    cleanupIntervalMs: config.l1CleanupIntervalMs,
  });

  const shared = new L2Cache(stateClient, logger, {
    keyPrefix: config.namespace,
    invalidationChannel: config.invalidationChannel,
    tagIndexPruneThreshold: config.tagIndexPruneThreshold,
  });

  const locks = new KeyLockRegistry(logger, {
    defaultTimeoutMs: config.lockTimeoutMs,
    maxWaitersPerKey: config.maxLockWaiters,
  });

  const metrics = new CacheMetrics({
    registry: options.registry,
    prefix: config.metricsPrefix,
  });

  const orchestrator = new CacheOrchestrator(
    { local, shared, invalidationBus: shared, locks, metrics },
    logger,
    {
      lockTimeoutMs: config.lockTimeoutMs,
      loaderTimeoutMs: config.loaderTimeoutMs,
      localTtlRatio: config.localTtlRatio,
      maxLocalTtlMs: config.maxLocalTtlMs,
      negativeCaching: config.negativeCaching,
      negativeTtlMs: config.negativeTtlMs,
      ...(options.instanceId ? { instanceId: options.instanceId } : {}),
    }
  );
  orchestrator.startInvalidationListener();

  const invalidator = new CacheInvalidator(orchestrator, logger);

  log.info({ namespace: config.namespace, instanceId: orchestrator.instanceId }, 'Tiered cache ready');

  return {
    orchestrator,
    invalidator,
    metrics,
    local,
    shared,
    async close(): Promise<void> {
      orchestrator.destroy();
      shared.destroy();
      local.destroy();
      if (ownedStateManager) {
        await ownedStateManager.close();
      }
      log.info('Tiered cache closed');
    },
  };
}

/**
 * Tiered Cache - Public Entry Point
 *
 * Read-through, write-invalidate caching over an in-process tier and a
 * shared Redis tier, with per-key stampede protection.
 */

export * from './infrastructure/cache/index.js';
export { StateManager, type SharedStateClient } from './services/StateManager.js';
export { loadConfig, getConfig, resetConfig, type Config } from './config.js';
export { createLogger } from './utils/logger.js';
export { createTieredCache, type TieredCache, type TieredCacheOptions } from './factory.js';

import { z } from 'zod';

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Shared tier (Redis)
  redisUrl: z.string().min(1).default('redis://localhost:6379'),
  namespace: z.string().min(1).default('cache'),
  invalidationChannel: z.string().min(1).default('cache:invalidation'),
  tagIndexPruneThreshold: z.number().int().min(1).default(1000),

  // Local tier
  localTtlRatio: z.number().gt(0).max(1).default(0.2),
  maxLocalTtlMs: z.number().int().min(1).optional(),
  l1MaxEntries: z.number().int().min(1).default(10000),
  l1CleanupIntervalMs: z.number().int().min(100).default(30000),

  // Stampede protection
  lockTimeoutMs: z.number().int().min(1).max(300000).default(5000),
  loaderTimeoutMs: z.number().int().min(0).max(300000).default(10000), // 0 = unbounded
  maxLockWaiters: z.number().int().min(1).default(1000),

  // Negative caching
  negativeCaching: z.boolean().default(false),
  negativeTtlMs: z.number().int().min(1).default(30000),

  // Observability
  metricsPrefix: z.string().regex(/^[a-zA-Z_][a-zA-Z0-9_]*$/).default('cache'),

  // Environment
  nodeEnv: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

function parseIntEnv(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function parseFloatEnv(value: string | undefined): number | undefined {
  return value ? parseFloat(value) : undefined;
}

function parseBoolEnv(value: string | undefined): boolean | undefined {
  if (!value) {
    return undefined;
  }
  return value === 'true' || value === '1';
}

/**
 * Parse environment variables into configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    redisUrl: env['REDIS_URL'] || undefined,
    namespace: env['CACHE_NAMESPACE'] || undefined,
    invalidationChannel: env['CACHE_INVALIDATION_CHANNEL'] || undefined,
    tagIndexPruneThreshold: parseIntEnv(env['CACHE_TAG_PRUNE_THRESHOLD']),
    localTtlRatio: parseFloatEnv(env['CACHE_LOCAL_TTL_RATIO']),
    maxLocalTtlMs: parseIntEnv(env['CACHE_MAX_LOCAL_TTL_MS']),
    l1MaxEntries: parseIntEnv(env['CACHE_L1_MAX_ENTRIES']),
    l1CleanupIntervalMs: parseIntEnv(env['CACHE_L1_CLEANUP_INTERVAL_MS']),
    lockTimeoutMs: parseIntEnv(env['CACHE_LOCK_TIMEOUT_MS']),
    loaderTimeoutMs: parseIntEnv(env['CACHE_LOADER_TIMEOUT_MS']),
    maxLockWaiters: parseIntEnv(env['CACHE_MAX_LOCK_WAITERS']),
    negativeCaching: parseBoolEnv(env['CACHE_NEGATIVE_CACHING']),
    negativeTtlMs: parseIntEnv(env['CACHE_NEGATIVE_TTL_MS']),
    metricsPrefix: env['CACHE_METRICS_PREFIX'] || undefined,
    nodeEnv: env['NODE_ENV'] || undefined,
    logLevel: env['LOG_LEVEL'] || undefined,
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - allow resetting config
export function resetConfig(): void {
  configInstance = null;
}

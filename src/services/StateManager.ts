import { Redis } from 'ioredis';
import type { Logger } from 'pino';

/**
 * Redis operations the shared cache tier depends on.
 * StateManager implements it against a live server.
 */
export interface SharedStateClient {
  isConnected(): boolean;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlMs?: number): Promise<void>;
  delete(...keys: string[]): Promise<number>;
  existsMany(keys: string[]): Promise<boolean[]>;
  pexpire(key: string, ttlMs: number): Promise<boolean>;
  pttl(key: string): Promise<number>;
  sadd(key: string, ...members: string[]): Promise<number>;
  srem(key: string, ...members: string[]): Promise<number>;
  smembers(key: string): Promise<string[]>;
  scard(key: string): Promise<number>;
  publish(channel: string, message: string): Promise<number>;
  subscribe(channel: string, callback: (message: string) => void): () => void;
}

/**
 * StateManager owns the Redis connection used by the shared cache tier.
 *
 * Key patterns (under the configured prefix):
 * - {prefix}:v:{key} - Cached values
 * - {prefix}:t:{tag} - Tag index sets
 */
export class StateManager implements SharedStateClient {
  private client: Redis | null = null;
  private readonly log: Logger;

  constructor(
    private readonly redisUrl: string,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'StateManager' });
  }

  /**
   * Connect to Redis
   */
  async connect(): Promise<void> {
    this.log.info('Connecting to Redis');

    this.client = new Redis(this.redisUrl, {
      maxRetriesPerRequest: 3,
      retryStrategy: (times) => {
        const delay = Math.min(times * 200, 5000);
        this.log.warn({ attempt: times, delayMs: delay }, 'Redis connection retry');
        return delay;
      },
      lazyConnect: false,
    });

    this.client.on('error', (error) => {
      this.log.error({ error }, 'Redis error');
    });

    this.client.on('connect', () => {
      this.log.info('Redis connected');
    });

    this.client.on('close', () => {
      this.log.warn('Redis connection closed');
    });

    // Test connection
    await this.client.ping();
    this.log.info('Redis connection verified');
  }

  isConnected(): boolean {
    return this.client?.status === 'ready';
  }

  /**
   * Ping Redis and return latency in ms
   */
  async ping(): Promise<number | null> {
    if (!this.client) {
      return null;
    }

    try {
      const start = Date.now();
      await this.client.ping();
      return Date.now() - start;
    } catch (error) {
      this.log.warn({ error }, 'Redis ping failed');
      return null;
    }
  }

  async close(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
      this.log.info('Redis connection closed');
    }
  }

  // ========== Key Operations ==========

  /**
   * Set a key with optional TTL
   */
  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    const client = this.requireClient();
    if (ttlMs) {
      await client.set(key, value, 'PX', ttlMs);
    } else {
      await client.set(key, value);
    }
  }

  async get(key: string): Promise<string | null> {
    return this.requireClient().get(key);
  }

  /**
   * Delete keys, returning how many existed
   */
  async delete(...keys: string[]): Promise<number> {
    if (keys.length === 0) {
      return 0;
    }
    return this.requireClient().del(...keys);
  }

  /**
   * Existence of each key, in order, in one round trip
   */
  async existsMany(keys: string[]): Promise<boolean[]> {
    if (keys.length === 0) {
      return [];
    }

    const pipeline = this.requireClient().pipeline();
    for (const key of keys) {
      pipeline.exists(key);
    }

    const results = await pipeline.exec();
    if (!results) {
      throw new Error('Pipeline execution failed');
    }

    return results.map(([error, count]) => {
      if (error) {
        throw error;
      }
      return count === 1;
    });
  }

  /**
   * Reset a key's TTL in milliseconds
   */
  async pexpire(key: string, ttlMs: number): Promise<boolean> {
    const result = await this.requireClient().pexpire(key, ttlMs);
    return result === 1;
  }

  /**
   * Remaining TTL in milliseconds: -1 without a TTL, -2 when the key is gone
   */
  async pttl(key: string): Promise<number> {
    return this.requireClient().pttl(key);
  }

  // ========== Set Operations ==========

  async sadd(key: string, ...members: string[]): Promise<number> {
    return this.requireClient().sadd(key, ...members);
  }

  async srem(key: string, ...members: string[]): Promise<number> {
    return this.requireClient().srem(key, ...members);
  }

  async smembers(key: string): Promise<string[]> {
    return this.requireClient().smembers(key);
  }

  async scard(key: string): Promise<number> {
    return this.requireClient().scard(key);
  }

  // ========== Pub/Sub Operations ==========

  async publish(channel: string, message: string): Promise<number> {
    return this.requireClient().publish(channel, message);
  }

  /**
   * Subscribe to channel
   * Returns unsubscribe function
   */
  subscribe(channel: string, callback: (message: string) => void): () => void {
    // Subscriber mode needs its own connection
    const subClient = this.requireClient().duplicate();

    subClient.subscribe(channel).catch((err: unknown) => {
      this.log.error({ error: err, channel }, 'Failed to subscribe');
    });

    subClient.on('message', (ch: string, msg: string) => {
      if (ch === channel) {
        callback(msg);
      }
    });

    return () => {
      subClient
        .unsubscribe(channel)
        .then(() => subClient.quit())
        .catch((err: unknown) => {
          this.log.warn({ error: err, channel }, 'Failed to close subscription');
        });
    };
  }

  private requireClient(): Redis {
    if (!this.client) {
      throw new Error('Redis not connected');
    }
    return this.client;
  }
}

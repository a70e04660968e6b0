/**
 * L2 Cache Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { L2Cache } from '../../../src/infrastructure/cache/L2Cache.js';
import { ExpirationPolicy } from '../../../src/infrastructure/cache/ExpirationPolicy.js';
import { TierUnavailableError } from '../../../src/infrastructure/cache/errors.js';
import type { CacheInvalidationEvent } from '../../../src/infrastructure/cache/types.js';
import { FakeStateManager } from '../../helpers/FakeStateManager.js';
import { silentLogger } from '../../helpers/logger.js';

const oneMinute = ExpirationPolicy.absolute(60_000);

describe('L2Cache', () => {
  let redis: FakeStateManager;
  let cache: L2Cache;

  beforeEach(() => {
    redis = new FakeStateManager();
    cache = new L2Cache(redis, silentLogger, {
      keyPrefix: 'test',
      invalidationChannel: 'test:invalidation',
      tagIndexPruneThreshold: 2,
    });
  });

  afterEach(() => {
    cache.destroy();
    vi.useRealTimers();
  });

  describe('get/set', () => {
    it('should store values under the prefixed key with a TTL', async () => {
      await cache.set('user:1', { name: 'Ada' }, oneMinute);

      expect(redis.peek('test:v:user:1')).toBe(
        '{"v":{"name":"Ada"},"x":{"kind":"absolute","durationMs":60000}}'
      );
      expect(redis.ttl('test:v:user:1')).toBeGreaterThan(59_000);
      await expect(cache.get('user:1')).resolves.toEqual({ name: 'Ada' });
    });

    it('should return undefined for missing keys', async () => {
      await expect(cache.get('missing')).resolves.toBeUndefined();
      expect(cache.getStats().misses).toBe(1);
    });

    it('should round-trip falsy values', async () => {
      await cache.set('zero', 0, oneMinute);
      await cache.set('null', null, oneMinute);

      await expect(cache.get('zero')).resolves.toBe(0);
      await expect(cache.get('null')).resolves.toBeNull();
    });

    it('should discard malformed entries', async () => {
      await redis.set('test:v:bad', 'not json');

      await expect(cache.get('bad')).resolves.toBeUndefined();
      expect(redis.peek('test:v:bad')).toBeUndefined();
    });
  });

  describe('expiration', () => {
    it('should let absolute entries lapse', async () => {
      vi.useFakeTimers();
      await cache.set('key', 'value', ExpirationPolicy.absolute(100));

      vi.advanceTimersByTime(99);
      await expect(cache.get('key')).resolves.toBe('value');
      vi.advanceTimersByTime(1);
      await expect(cache.get('key')).resolves.toBeUndefined();
    });

    it('should re-arm sliding entries on every hit', async () => {
      vi.useFakeTimers();
      await cache.set('key', 'value', ExpirationPolicy.sliding(100));

      for (let i = 0; i < 4; i++) {
        vi.advanceTimersByTime(60);
        await expect(cache.get('key')).resolves.toBe('value');
      }

      vi.advanceTimersByTime(100);
      await expect(cache.get('key')).resolves.toBeUndefined();
    });

    it('should report the time left before the entry lapses', async () => {
      vi.useFakeTimers();
      await cache.set('fixed', 'a', ExpirationPolicy.absolute(100));
      await cache.set('renewed', 'b', ExpirationPolicy.sliding(100));

      vi.advanceTimersByTime(30);

      await expect(cache.getEntry('fixed')).resolves.toEqual({ value: 'a', remainingMs: 70 });
      await expect(cache.getEntry('renewed')).resolves.toEqual({ value: 'b', remainingMs: 100 });
    });
  });

  describe('tags', () => {
    it('should index tagged keys and remove them together', async () => {
      await cache.set('a', 1, oneMinute, ['group']);
      await cache.set('b', 2, oneMinute, ['group', 'group']);
      await cache.set('c', 3, oneMinute);

      expect(redis.members('test:t:group').sort()).toEqual(['a', 'b']);

      await cache.removeByTag('group');

      await expect(cache.get('a')).resolves.toBeUndefined();
      await expect(cache.get('b')).resolves.toBeUndefined();
      await expect(cache.get('c')).resolves.toBe(3);
      expect(redis.members('test:t:group')).toEqual([]);
      expect(cache.getStats().invalidations).toBe(2);
    });

    it('should accept an unknown tag', async () => {
      await expect(cache.removeByTag('nothing')).resolves.toBeUndefined();
    });

    it('should prune expired members once the index passes the threshold', async () => {
      vi.useFakeTimers();
      await cache.set('a', 1, ExpirationPolicy.absolute(50), ['t']);
      await cache.set('b', 2, ExpirationPolicy.absolute(50), ['t']);
      vi.advanceTimersByTime(50);

      await cache.set('c', 3, oneMinute, ['t']);

      expect(redis.members('test:t:t')).toEqual(['c']);
    });

    it('should report how many members were pruned', async () => {
      await redis.sadd('test:t:t', 'gone', 'also-gone');
      await cache.set('live', 1, oneMinute);
      await redis.sadd('test:t:t', 'live');

      await expect(cache.pruneTag('t')).resolves.toBe(2);
      expect(redis.members('test:t:t')).toEqual(['live']);
    });
  });

  describe('remove', () => {
    it('should delete the key and count only real deletions', async () => {
      await cache.set('key', 'value', oneMinute);

      await cache.remove('key');
      await cache.remove('key');

      await expect(cache.get('key')).resolves.toBeUndefined();
      expect(cache.getStats().deletes).toBe(1);
    });
  });

  describe('failures', () => {
    it('should surface Redis errors as TierUnavailableError', async () => {
      redis.failing = true;

      const error = await cache.get('key').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TierUnavailableError);
      expect(error).toMatchObject({ tier: 'shared', operation: 'get', recoverable: true });
      await expect(cache.set('key', 1, oneMinute)).rejects.toBeInstanceOf(TierUnavailableError);
      await expect(cache.remove('key')).rejects.toBeInstanceOf(TierUnavailableError);
      await expect(cache.removeByTag('t')).rejects.toBeInstanceOf(TierUnavailableError);
    });

    it('should not store the value when its tag cannot be indexed', async () => {
      redis.failingCommands.add('sadd');

      await expect(cache.set('key', 1, oneMinute, ['t'])).rejects.toMatchObject({
        tier: 'shared',
        operation: 'tag',
      });

      expect(redis.peek('test:v:key')).toBeUndefined();
      expect(cache.getStats().sets).toBe(0);
    });
  });

  describe('invalidation bus', () => {
    const event: CacheInvalidationEvent = {
      kind: 'key',
      target: 'user:1',
      source: 'instance-a',
      timestamp: 1700000000000,
    };

    it('should deliver published events to subscribers', async () => {
      const received: CacheInvalidationEvent[] = [];
      cache.subscribe((e) => received.push(e));

      await cache.publish(event);

      expect(received).toEqual([event]);
      expect(redis.published[0]?.channel).toBe('test:invalidation');
    });

    it('should ignore malformed messages', async () => {
      const handler = vi.fn();
      cache.subscribe(handler);

      await redis.publish('test:invalidation', '{"kind":"everything"}');
      await redis.publish('test:invalidation', 'garbage');

      expect(handler).not.toHaveBeenCalled();
    });

    it('should stop delivering after unsubscribe', async () => {
      const handler = vi.fn();
      const unsubscribe = cache.subscribe(handler);

      unsubscribe();
      await cache.publish(event);

      expect(handler).not.toHaveBeenCalled();
      expect(redis.subscriberCount('test:invalidation')).toBe(0);
    });

    it('should not subscribe while disconnected', () => {
      redis.connected = false;

      cache.subscribe(vi.fn());

      expect(redis.subscriberCount('test:invalidation')).toBe(0);
    });

    it('should drop listeners on destroy', () => {
      cache.subscribe(vi.fn());
      cache.subscribe(vi.fn());

      cache.destroy();

      expect(redis.subscriberCount('test:invalidation')).toBe(0);
    });
  });
});

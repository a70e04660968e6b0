import { describe, it, expect } from 'vitest';
import {
  decodeEntry,
  decodeInvalidationEvent,
  encodeEntry,
} from '../../../src/infrastructure/cache/entry-codec.js';
import { ExpirationKind } from '../../../src/infrastructure/cache/types.js';

describe('entry codec', () => {
  it('should omit the tag list when there are no tags', () => {
    expect(encodeEntry('v', { kind: ExpirationKind.SLIDING, durationMs: 500 }, [])).toBe(
      '{"v":"v","x":{"kind":"sliding","durationMs":500}}'
    );
  });

  it('should decode tags and default them to empty', () => {
    expect(decodeEntry('{"v":1,"x":{"kind":"absolute","durationMs":10},"t":["a"]}')).toEqual({
      value: 1,
      expiration: { kind: ExpirationKind.ABSOLUTE, durationMs: 10 },
      tags: ['a'],
    });
    expect(decodeEntry('{"v":null,"x":{"kind":"absolute","durationMs":10}}')?.tags).toEqual([]);
  });

  it.each([
    ['invalid JSON', '{'],
    ['a missing value', '{"x":{"kind":"absolute","durationMs":10}}'],
    ['an unknown expiration kind', '{"v":1,"x":{"kind":"forever","durationMs":10}}'],
    ['a non-positive duration', '{"v":1,"x":{"kind":"absolute","durationMs":0}}'],
  ])('should reject %s', (_, raw) => {
    expect(decodeEntry(raw)).toBeNull();
  });

  it('should validate invalidation events', () => {
    expect(decodeInvalidationEvent('{"kind":"tag","target":"users","source":"a","timestamp":1}')).toEqual({
      kind: 'tag',
      target: 'users',
      source: 'a',
      timestamp: 1,
    });
    expect(decodeInvalidationEvent('{"kind":"tag","target":"users"}')).toBeNull();
  });
});

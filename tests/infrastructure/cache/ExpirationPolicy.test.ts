/**
 * Expiration Policy Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ExpirationPolicy,
  assertValidExpiration,
  computeDeadline,
  isExpired,
  refreshDeadline,
} from '../../../src/infrastructure/cache/ExpirationPolicy.js';
import { InvalidExpirationError } from '../../../src/infrastructure/cache/errors.js';
import { ExpirationKind } from '../../../src/infrastructure/cache/types.js';

describe('ExpirationPolicy', () => {
  describe('deadlines', () => {
    it('should place the deadline one duration after the write', () => {
      expect(computeDeadline(ExpirationPolicy.absolute(500), 1000)).toBe(1500);
    });

    it('should keep absolute deadlines fixed on read', () => {
      expect(refreshDeadline(ExpirationPolicy.absolute(500), 1500, 1400)).toBe(1500);
    });

    it('should extend sliding deadlines from the read time', () => {
      expect(refreshDeadline(ExpirationPolicy.sliding(500), 1500, 1400)).toBe(1900);
    });

    it('should treat the deadline itself as expired', () => {
      expect(isExpired(1500, 1499)).toBe(false);
      expect(isExpired(1500, 1500)).toBe(true);
    });
  });

  describe('assertValidExpiration', () => {
    it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])('should reject %s', (durationMs) => {
      expect(() => assertValidExpiration({ kind: ExpirationKind.ABSOLUTE, durationMs })).toThrow(
        InvalidExpirationError
      );
    });

    it('should accept a positive duration', () => {
      expect(() => assertValidExpiration(ExpirationPolicy.sliding(1))).not.toThrow();
    });
  });

  describe('deriveLocal', () => {
    const policy = new ExpirationPolicy({ localTtlRatio: 0.2 });

    it('should scale the shared duration and keep the kind', () => {
      expect(policy.deriveLocal(ExpirationPolicy.absolute(300_000))).toEqual({
        kind: ExpirationKind.ABSOLUTE,
        durationMs: 60_000,
      });
      expect(policy.deriveLocal(ExpirationPolicy.sliding(1000))).toEqual({
        kind: ExpirationKind.SLIDING,
        durationMs: 200,
      });
    });

    it('should never go below one millisecond', () => {
      expect(policy.deriveLocal(ExpirationPolicy.absolute(2)).durationMs).toBe(1);
    });

    it('should cap at maxLocalTtlMs', () => {
      const capped = new ExpirationPolicy({ localTtlRatio: 0.5, maxLocalTtlMs: 1000 });
      expect(capped.deriveLocal(ExpirationPolicy.absolute(10_000)).durationMs).toBe(1000);
      expect(capped.deriveLocal(ExpirationPolicy.absolute(1000)).durationMs).toBe(500);
    });

    it('should equal the shared duration at ratio 1', () => {
      const full = new ExpirationPolicy({ localTtlRatio: 1 });
      expect(full.deriveLocal(ExpirationPolicy.absolute(750)).durationMs).toBe(750);
    });

    it('should reject an invalid shared expiration', () => {
      expect(() => policy.deriveLocal(ExpirationPolicy.absolute(0))).toThrow(InvalidExpirationError);
    });
  });

  describe('backfill', () => {
    const policy = new ExpirationPolicy({ localTtlRatio: 0.2 });

    it('should end an absolute copy with the shared entry', () => {
      expect(policy.backfill(ExpirationPolicy.absolute(200), 10.7)).toEqual({
        kind: ExpirationKind.ABSOLUTE,
        durationMs: 10,
      });
      expect(policy.backfill(ExpirationPolicy.absolute(200), 5000)?.durationMs).toBe(200);
    });

    it('should skip an absolute copy with nothing left', () => {
      expect(policy.backfill(ExpirationPolicy.absolute(200), 0.5)).toBeNull();
    });

    it('should keep the full sliding window', () => {
      expect(policy.backfill(ExpirationPolicy.sliding(200), 10)).toEqual(ExpirationPolicy.sliding(200));
    });
  });

  it.each([0, -0.5, 1.5])('should reject localTtlRatio %s', (localTtlRatio) => {
    expect(() => new ExpirationPolicy({ localTtlRatio })).toThrow(RangeError);
  });

  it('should build absolute negative expirations', () => {
    const policy = new ExpirationPolicy({ localTtlRatio: 0.2 });
    expect(policy.negative(30_000)).toEqual({ kind: ExpirationKind.ABSOLUTE, durationMs: 30_000 });
    expect(() => policy.negative(0)).toThrow(InvalidExpirationError);
  });
});

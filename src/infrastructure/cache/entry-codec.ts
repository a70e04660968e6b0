/**
 * Shared-tier wire format
 *
 * Entries are stored in Redis as a JSON envelope carrying the value,
 * its expiration and its tags, so a read can refresh sliding TTLs and
 * the tag index without a second lookup.
 */

import { z } from 'zod';
import type { CacheInvalidationEvent, CacheTag, ExpirationSpec } from './types.js';
import { ExpirationKind } from './types.js';

const expirationSchema = z.object({
  kind: z.nativeEnum(ExpirationKind),
  durationMs: z.number().positive().finite(),
});

const storedEntrySchema = z.object({
  v: z.unknown(),
  x: expirationSchema,
  t: z.array(z.string()).optional(),
});

const invalidationEventSchema = z.object({
  kind: z.enum(['key', 'tag']),
  target: z.string(),
  source: z.string(),
  timestamp: z.number(),
  reason: z.string().optional(),
});

export interface StoredEntry {
  value: unknown;
  expiration: ExpirationSpec;
  tags: CacheTag[];
}

export function encodeEntry(
  value: unknown,
  expiration: ExpirationSpec,
  tags: readonly CacheTag[]
): string {
  return JSON.stringify({
    v: value,
    x: { kind: expiration.kind, durationMs: expiration.durationMs },
    ...(tags.length > 0 ? { t: [...tags] } : {}),
  });
}

/**
 * Decode a stored envelope. Returns null for anything malformed.
 */
export function decodeEntry(raw: string): StoredEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  const result = storedEntrySchema.safeParse(parsed);
  if (!result.success || !('v' in result.data)) {
    return null;
  }

  return {
    value: result.data.v,
    expiration: result.data.x,
    tags: result.data.t ?? [],
  };
}

export function encodeInvalidationEvent(event: CacheInvalidationEvent): string {
  return JSON.stringify(event);
}

/**
 * Decode an invalidation message. Returns null for anything malformed.
 */
export function decodeInvalidationEvent(raw: string): CacheInvalidationEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  const result = invalidationEventSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

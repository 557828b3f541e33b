import type { EpochSeconds } from '../types';
import { isRecord } from '../utils/guards';

/**
 * Durable key/value store backing the auth cache. Values are opaque strings;
 * each `put` replaces the previous value for the key atomically.
 */
export interface CacheStore {
  get(key: string): Promise<string | undefined>;
  put(key: string, value: string): Promise<void>;
}

export interface CacheEntry {
  key: string;
  value: unknown;
  expiresAt: EpochSeconds;
  /** Checksum of the identity the value was derived for. */
  fingerprint: string;
}

export function serializeEntry(entry: CacheEntry): string {
  return JSON.stringify(entry);
}

/** Throws when `raw` is not a well-formed entry. */
export function parseEntry(raw: string): CacheEntry {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error('Cache entry is not an object');
  }

  const { key, value, expiresAt, fingerprint } = parsed;
  if (typeof key !== 'string' || typeof fingerprint !== 'string') {
    throw new Error('Cache entry is missing key or fingerprint');
  }
  if (typeof expiresAt !== 'number' || !Number.isFinite(expiresAt)) {
    throw new Error('Cache entry is missing expiresAt');
  }

  return { key, value, expiresAt, fingerprint };
}

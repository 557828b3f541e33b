import type { CacheStore } from '../cache/cacheStore';
import { parseEntry, serializeEntry } from '../cache/cacheStore';
import { CacheReadError } from '../errors';
import type { EpochSeconds, Expiring } from '../types';
import { logger } from '../utils/logger';
import { epochToIso } from '../utils/time';
import type { Lazy, Stage, StageCodec, StageName } from './stage';

/**
 * Serves a stage's value from the durable cache while it is unexpired and was
 * derived for the same identity; otherwise computes it through the wrapped stage.
 * A computed value is held until `flush()` writes it (overwriting the entry) or
 * `discard()` drops it, so nothing is persisted from a run that fails downstream.
 */
export class CachingStage<I, V extends Expiring> implements Stage<I, V> {
  readonly name: StageName;
  private pending: V | null = null;

  constructor(
    private readonly inner: Stage<I, V>,
    private readonly store: CacheStore,
    private readonly codec: StageCodec<V>,
    private readonly fingerprint: string
  ) {
    this.name = inner.name;
  }

  async value(input: Lazy<I>, now: EpochSeconds): Promise<V> {
    const cached = await this.read(now);
    if (cached) {
      logger.debug(`[CACHE] ${this.name}: hit (expires: ${epochToIso(cached.expiresAt)})`);
      return cached;
    }

    const fresh = await this.inner.value(input, now);
    this.pending = fresh;
    return fresh;
  }

  async flush(): Promise<void> {
    const value = this.pending;
    this.pending = null;
    if (value) {
      await this.write(value);
    }
  }

  discard(): void {
    this.pending = null;
  }

  private async read(now: EpochSeconds): Promise<V | null> {
    let raw: string | undefined;
    try {
      raw = await this.store.get(this.name);
    } catch (error) {
      this.reportMiss(error);
      return null;
    }

    if (raw === undefined) {
      logger.debug(`[CACHE] ${this.name}: miss`);
      return null;
    }

    try {
      const entry = parseEntry(raw);
      if (entry.key !== this.name || entry.fingerprint !== this.fingerprint) {
        logger.debug(`[CACHE] ${this.name}: entry belongs to a different identity`);
        return null;
      }
      if (entry.expiresAt <= now) {
        logger.debug(`[CACHE] ${this.name}: expired at ${epochToIso(entry.expiresAt)}`);
        return null;
      }

      const value = this.codec.decode(entry.value);
      return value.expiresAt > now ? value : null;
    } catch (error) {
      this.reportMiss(error);
      return null;
    }
  }

  private async write(value: V): Promise<void> {
    const entry = serializeEntry({
      key: this.name,
      value: this.codec.encode(value),
      expiresAt: value.expiresAt,
      fingerprint: this.fingerprint,
    });

    try {
      await this.store.put(this.name, entry);
    } catch (error) {
      logger.error(`[CACHE] ${this.name}: failed to store entry`, error);
    }
  }

  private reportMiss(error: unknown): void {
    const readError = error instanceof CacheReadError
      ? error
      : new CacheReadError(this.name, `Unreadable cache entry for ${this.name}`, { cause: error });
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`[CACHE] ${readError.message}, recomputing`, { key: readError.key, reason });
  }
}

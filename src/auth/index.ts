import { HttpTransport } from '../api/transport';
import type { CacheStore } from '../cache/cacheStore';
import { FileCacheStore } from '../cache/fileCacheStore';
import { PgCacheStore } from '../cache/pgCacheStore';
import { loadPrivateKey } from '../config';
import type { AppConfig } from '../config';
import { asSqlClient, getPool } from '../database/pool';
import type { EpochSeconds, RequestHeaders } from '../types';
import { logger } from '../utils/logger';
import { createAuthPipeline, identityFingerprint, resolveRequestHeaders, withCaching } from './pipeline';

export async function openCacheStore(config: AppConfig): Promise<CacheStore> {
  if (config.cache.backend === 'postgres') {
    const store = new PgCacheStore(asSqlClient(getPool(config.database)));
    await store.ensureSchema();
    return store;
  }

  const store = await FileCacheStore.open(config.cache.tmpDir, config.cache.fileName);
  logger.info(`Using auth cache file ${store.filePath}`);
  return store;
}

/**
 * Build the auth pipeline from configuration and derive this run's request headers.
 */
export async function authenticate(config: AppConfig, now: EpochSeconds): Promise<RequestHeaders> {
  let pipeline = createAuthPipeline(
    config,
    new HttpTransport({
      timeout: config.http.timeout,
      maxRetries: config.http.maxRetries,
      retryBaseDelay: config.http.retryBaseDelay,
    })
  );

  if (config.cache.enabled) {
    const store = await openCacheStore(config);
    pipeline = withCaching(pipeline, store, identityFingerprint(config));
  }

  return resolveRequestHeaders(pipeline, () => loadPrivateKey(config.privateKey), now);
}

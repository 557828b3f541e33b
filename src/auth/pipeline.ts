import type { Transport } from '../api/transport';
import type { CacheStore } from '../cache/cacheStore';
import type { AppConfig } from '../config';
import type { AccessToken, EpochSeconds, RequestHeaders, SignedSecret } from '../types';
import { checksumFrom } from '../utils/hash';
import { AccessTokenStage, accessTokenCodec } from './accessToken';
import { CachingStage } from './cachingStage';
import { ClientSecret, clientSecretCodec } from './clientSecret';
import { RequestHeadersStage, requestHeadersCodec } from './requestHeaders';
import type { Lazy, Stage, StageName } from './stage';

export interface AuthPipeline {
  clientSecret: Stage<string, SignedSecret>;
  accessToken: Stage<SignedSecret, AccessToken>;
  requestHeaders: Stage<AccessToken, RequestHeaders>;
}

export const ALL_STAGES: readonly StageName[] = ['client_secret', 'access_token', 'request_headers'];

export function createAuthPipeline(config: AppConfig, transport: Transport): AuthPipeline {
  return {
    clientSecret: new ClientSecret(config.identity, config.expirationTime),
    accessToken: new AccessTokenStage(config.identity.clientId, config.tokenUrl, transport),
    requestHeaders: new RequestHeadersStage(config.orgId),
  };
}

/**
 * Checksum of everything a cached value depends on. Entries written for a
 * different identity are ignored and overwritten.
 */
export function identityFingerprint(config: AppConfig): string {
  return checksumFrom({
    ...config.identity,
    orgId: config.orgId,
    tokenUrl: config.tokenUrl,
  });
}

/**
 * Wraps the selected stages with the durable cache. Each wrapped stage decides
 * hit or miss on its own entry.
 */
export function withCaching(
  pipeline: AuthPipeline,
  store: CacheStore,
  fingerprint: string,
  stages: readonly StageName[] = ALL_STAGES
): AuthPipeline {
  return {
    clientSecret: stages.includes('client_secret')
      ? new CachingStage(pipeline.clientSecret, store, clientSecretCodec, fingerprint)
      : pipeline.clientSecret,
    accessToken: stages.includes('access_token')
      ? new CachingStage(pipeline.accessToken, store, accessTokenCodec, fingerprint)
      : pipeline.accessToken,
    requestHeaders: stages.includes('request_headers')
      ? new CachingStage(pipeline.requestHeaders, store, requestHeadersCodec, fingerprint)
      : pipeline.requestHeaders,
  };
}

interface PendingWrites {
  flush(): Promise<void>;
  discard(): void;
}

function cachingStages(pipeline: AuthPipeline): PendingWrites[] {
  const stages: PendingWrites[] = [];
  for (const stage of [pipeline.clientSecret, pipeline.accessToken, pipeline.requestHeaders]) {
    if (stage instanceof CachingStage) {
      stages.push(stage);
    }
  }
  return stages;
}

/**
 * Derives the request headers for one run. `now` is sampled once by the caller
 * and shared by every stage; upstream stages only run when a downstream one needs them.
 * Cache entries are written only once the whole run has succeeded.
 */
export async function resolveRequestHeaders(
  pipeline: AuthPipeline,
  privateKey: Lazy<string>,
  now: EpochSeconds
): Promise<RequestHeaders> {
  const pending = cachingStages(pipeline);
  const clientSecret = () => pipeline.clientSecret.value(privateKey, now);
  const accessToken = () => pipeline.accessToken.value(clientSecret, now);

  let headers: RequestHeaders;
  try {
    headers = await pipeline.requestHeaders.value(accessToken, now);
  } catch (error) {
    pending.forEach((stage) => stage.discard());
    throw error;
  }

  for (const stage of pending) {
    await stage.flush();
  }
  return headers;
}

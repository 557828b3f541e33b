import { promises as fs } from 'node:fs';
import os from 'node:os';
import dotenv from 'dotenv';
import { ConfigurationError } from './errors';
import type { SigningIdentity } from './types';

dotenv.config();

export type CacheBackend = 'file' | 'postgres';

export type PrivateKeySource =
  | { kind: 'value'; value: string }
  | { kind: 'file'; path: string };

export interface AppConfig {
  identity: SigningIdentity;
  orgId: string;
  expirationTime: number;
  tokenUrl: string;
  apiUrl: string;
  privateKey: PrivateKeySource;
  cache: {
    enabled: boolean;
    backend: CacheBackend;
    tmpDir: string;
    fileName: string;
  };
  database: {
    host: string;
    port: number;
    name: string;
    user: string;
    password: string;
  };
  http: {
    timeout: number;
    maxRetries: number;
    retryBaseDelay: number;
  };
  sync: {
    pageLimit: number;
  };
}

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigurationError(`Missing required configuration: ${name}`);
  }
  return value;
}

function optional(env: Env, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

function positiveInt(env: Env, name: string, fallback: number, allowZero = false): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0 || (parsed === 0 && !allowZero)) {
    throw new ConfigurationError(`${name} must be a ${allowZero ? 'non-negative' : 'positive'} integer, got "${raw}"`);
  }
  return parsed;
}

function flag(env: Env, name: string): boolean {
  const raw = env[name]?.trim().toLowerCase();
  return raw === 'true' || raw === '1' || raw === 'yes';
}

function privateKeySource(env: Env): PrivateKeySource {
  const value = env.SEARCH_ADS_PRIVATE_KEY_VALUE;
  if (value?.trim()) {
    return { kind: 'value', value };
  }

  const path = env.SEARCH_ADS_PRIVATE_KEY_FILE?.trim();
  if (path) {
    return { kind: 'file', path };
  }

  throw new ConfigurationError(
    'Missing private key configuration: set SEARCH_ADS_PRIVATE_KEY_VALUE or SEARCH_ADS_PRIVATE_KEY_FILE'
  );
}

function cacheBackend(env: Env): CacheBackend {
  const raw = optional(env, 'SEARCH_ADS_CACHE_BACKEND', 'file');
  if (raw !== 'file' && raw !== 'postgres') {
    throw new ConfigurationError(`SEARCH_ADS_CACHE_BACKEND must be "file" or "postgres", got "${raw}"`);
  }
  return raw;
}

/**
 * Build the run configuration from environment variables.
 * Throws ConfigurationError for anything missing or malformed.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    identity: {
      clientId: required(env, 'SEARCH_ADS_CLIENT_ID'),
      teamId: required(env, 'SEARCH_ADS_TEAM_ID'),
      keyId: required(env, 'SEARCH_ADS_KEY_ID'),
      audience: optional(env, 'SEARCH_ADS_AUDIENCE', 'https://appleid.apple.com'),
      algorithm: optional(env, 'SEARCH_ADS_ALGORITHM', 'ES256'),
    },
    orgId: required(env, 'SEARCH_ADS_ORG_ID'),
    expirationTime: positiveInt(env, 'SEARCH_ADS_EXPIRATION_TIME', 86400),
    tokenUrl: optional(env, 'SEARCH_ADS_TOKEN_URL', 'https://appleid.apple.com/auth/oauth2/token'),
    apiUrl: optional(env, 'SEARCH_ADS_API_URL', 'https://api.searchads.apple.com/api/v4'),
    privateKey: privateKeySource(env),
    cache: {
      enabled: flag(env, 'SEARCH_ADS_LOCAL_CACHING'),
      backend: cacheBackend(env),
      tmpDir: optional(env, 'SEARCH_ADS_TMP_DIR', os.tmpdir()),
      fileName: optional(env, 'SEARCH_ADS_AUTH_CACHE_FILE', 'search_ads_auth_cache.json'),
    },
    database: {
      host: optional(env, 'DB_HOST', 'localhost'),
      port: positiveInt(env, 'DB_PORT', 5432),
      name: optional(env, 'DB_NAME', 'search_ads'),
      user: optional(env, 'DB_USER', 'postgres'),
      password: optional(env, 'DB_PASSWORD', 'postgres'),
    },
    http: {
      timeout: positiveInt(env, 'HTTP_TIMEOUT_MS', 10000),
      maxRetries: positiveInt(env, 'HTTP_MAX_RETRIES', 3, true),
      retryBaseDelay: positiveInt(env, 'HTTP_RETRY_BASE_DELAY_MS', 1000, true),
    },
    sync: {
      pageLimit: positiveInt(env, 'CAMPAIGN_PAGE_LIMIT', 1000),
    },
  };
}

/**
 * Read the PEM private key. Only called when a client secret actually has to be signed.
 */
export async function loadPrivateKey(source: PrivateKeySource): Promise<string> {
  if (source.kind === 'value') {
    return source.value;
  }

  try {
    return await fs.readFile(source.path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read private key file [${source.path}]`, { cause: error });
  }
}

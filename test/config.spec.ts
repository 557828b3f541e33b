import { describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { loadConfig, loadPrivateKey } from "../src/config";
import { ConfigurationError } from "../src/errors";

const baseEnv = {
  SEARCH_ADS_CLIENT_ID: "c1",
  SEARCH_ADS_TEAM_ID: "t1",
  SEARCH_ADS_KEY_ID: "k1",
  SEARCH_ADS_ORG_ID: "org1",
  SEARCH_ADS_PRIVATE_KEY_VALUE: "test-key",
};

describe("loadConfig", () => {
  it("applies defaults for optional settings", () => {
    const config = loadConfig(baseEnv);

    expect(config.identity).toEqual({
      clientId: "c1",
      teamId: "t1",
      keyId: "k1",
      audience: "https://appleid.apple.com",
      algorithm: "ES256",
    });
    expect(config.orgId).toBe("org1");
    expect(config.expirationTime).toBe(86400);
    expect(config.tokenUrl).toBe("https://appleid.apple.com/auth/oauth2/token");
    expect(config.privateKey).toEqual({ kind: "value", value: "test-key" });
    expect(config.cache.enabled).toBe(false);
    expect(config.cache.backend).toBe("file");
    expect(config.cache.fileName).toBe("search_ads_auth_cache.json");
  });

  it("reads overrides", () => {
    const config = loadConfig({
      ...baseEnv,
      SEARCH_ADS_EXPIRATION_TIME: "1200",
      SEARCH_ADS_ALGORITHM: "ES384",
      SEARCH_ADS_LOCAL_CACHING: "true",
      SEARCH_ADS_CACHE_BACKEND: "postgres",
      SEARCH_ADS_TMP_DIR: "/var/cache/ads",
      HTTP_MAX_RETRIES: "0",
    });

    expect(config.expirationTime).toBe(1200);
    expect(config.identity.algorithm).toBe("ES384");
    expect(config.cache).toEqual({
      enabled: true,
      backend: "postgres",
      tmpDir: "/var/cache/ads",
      fileName: "search_ads_auth_cache.json",
    });
    expect(config.http.maxRetries).toBe(0);
  });

  it.each(["SEARCH_ADS_CLIENT_ID", "SEARCH_ADS_TEAM_ID", "SEARCH_ADS_KEY_ID", "SEARCH_ADS_ORG_ID"])(
    "requires %s",
    (name) => {
      expect(() => loadConfig({ ...baseEnv, [name]: "" })).toThrow(`Missing required configuration: ${name}`);
    }
  );

  it("requires a private key source", () => {
    const { SEARCH_ADS_PRIVATE_KEY_VALUE: _omitted, ...env } = baseEnv;

    expect(() => loadConfig(env)).toThrow(ConfigurationError);
  });

  it("falls back to a private key file", () => {
    const { SEARCH_ADS_PRIVATE_KEY_VALUE: _omitted, ...env } = baseEnv;

    expect(loadConfig({ ...env, SEARCH_ADS_PRIVATE_KEY_FILE: "/keys/ads.pem" }).privateKey).toEqual({
      kind: "file",
      path: "/keys/ads.pem",
    });
  });

  it.each(["0", "-5", "1.5", "soon"])("rejects expiration time %s", (value) => {
    expect(() => loadConfig({ ...baseEnv, SEARCH_ADS_EXPIRATION_TIME: value })).toThrow(ConfigurationError);
  });

  it("rejects an unknown cache backend", () => {
    expect(() => loadConfig({ ...baseEnv, SEARCH_ADS_CACHE_BACKEND: "redis" })).toThrow(
      'SEARCH_ADS_CACHE_BACKEND must be "file" or "postgres", got "redis"'
    );
  });
});

describe("loadPrivateKey", () => {
  it("returns an inline key as-is", async () => {
    expect(await loadPrivateKey({ kind: "value", value: "inline" })).toBe("inline");
  });

  it("reads a key file", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "key-"));
    try {
      const file = path.join(dir, "key.pem");
      await writeFile(file, "pem-contents");

      expect(await loadPrivateKey({ kind: "file", path: file })).toBe("pem-contents");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("raises ConfigurationError for a missing key file", async () => {
    await expect(loadPrivateKey({ kind: "file", path: "/does/not/exist.pem" })).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });
});

import { generateKeyPairSync } from "node:crypto";
import type { Transport, TransportResponse } from "../../src/api/transport";
import type { AppConfig } from "../../src/config";

export function generateEcKeyPair(): { privateKey: string; publicKey: string } {
  const { privateKey, publicKey } = generateKeyPairSync("ec", { namedCurve: "P-256" });
  return {
    privateKey: privateKey.export({ type: "pkcs8", format: "pem" }).toString(),
    publicKey: publicKey.export({ type: "spki", format: "pem" }).toString(),
  };
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    identity: {
      clientId: "c1",
      teamId: "t1",
      audience: "a1",
      keyId: "k1",
      algorithm: "ES256",
    },
    orgId: "org1",
    expirationTime: 1200,
    tokenUrl: "https://auth.test/token",
    apiUrl: "https://api.test/v4",
    privateKey: { kind: "value", value: "unused" },
    cache: { enabled: true, backend: "file", tmpDir: "/tmp", fileName: "auth.json" },
    database: { host: "localhost", port: 5432, name: "test", user: "test", password: "test-secret" },
    http: { timeout: 1000, maxRetries: 0, retryBaseDelay: 0 },
    sync: { pageLimit: 10 },
    ...overrides,
  };
}

/** Replies with queued responses in order and records every form it receives. */
export class StubTransport implements Transport {
  readonly calls: Array<{ url: string; form: Record<string, string> }> = [];

  constructor(private readonly responses: Array<TransportResponse | Error>) {}

  async postForm(url: string, form: Record<string, string>): Promise<TransportResponse> {
    this.calls.push({ url, form });
    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error("StubTransport: no response queued");
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export function tokenResponse(accessToken: string, expiresIn: number): TransportResponse {
  return {
    status: 200,
    body: JSON.stringify({ access_token: accessToken, token_type: "Bearer", expires_in: expiresIn, scope: "searchadsorg" }),
  };
}

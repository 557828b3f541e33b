import { describe, it, expect, vi, beforeEach } from "vitest";
import fetch, { Response } from "node-fetch";
import { ApiError } from "../src/api/campaignClient";
import { syncCampaigns } from "../src/syncCampaigns";

vi.mock("node-fetch", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node-fetch")>();
  return { ...actual, default: vi.fn() };
});

const fetchMock = vi.mocked(fetch);
const headers = { orgId: "org1", authorization: "Bearer abc", expiresAt: 2_000_000_000 };
const options = { apiUrl: "https://api.test/v4", pageLimit: 2, timeout: 1000, maxRetries: 1, retryBaseDelay: 0 };

describe("syncCampaigns", () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it("writes one RECORD line per campaign using the auth headers", async () => {
    const campaigns = [
      { id: 1, orgId: 10, name: "Spring", status: "ENABLED" },
      { id: 2, orgId: 10, name: "Summer", status: "PAUSED" },
    ];
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ data: campaigns, pagination: null }), { status: 200 }));
    const lines: string[] = [];

    const count = await syncCampaigns(headers, options, (line) => lines.push(line));

    expect(count).toBe(2);
    expect(lines).toEqual([
      '{"type":"RECORD","stream":"campaign","record":{"id":1,"orgId":10,"name":"Spring","status":"ENABLED"}}',
      '{"type":"RECORD","stream":"campaign","record":{"id":2,"orgId":10,"name":"Summer","status":"PAUSED"}}',
    ]);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://api.test/v4/campaigns?limit=2&offset=0");
    expect(init).toMatchObject({ headers: { Authorization: "Bearer abc", "X-AP-Context": "orgId=org1" } });
  });

  it("fails without retrying when the API rejects the credentials", async () => {
    fetchMock.mockResolvedValueOnce(new Response("unauthorized", { status: 401 }));

    const error = await syncCampaigns(headers, options, () => undefined).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ status: 401, body: "unauthorized" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

import { toHttpHeaders } from '../auth/requestHeaders';
import type { Campaign, CampaignsResponse, RequestHeaders } from '../types';
import { fetchWithTimeout } from '../utils/fetchWithTimeout';
import { isRecord } from '../utils/guards';
import { exponentialBackoff } from '../utils/retry';

export interface CampaignClientOptions {
  apiUrl: string;
  pageLimit: number;
  timeout: number;
  maxRetries: number;
  retryBaseDelay: number;
}

export class ApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string,
    message: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

function isCampaignsResponse(value: unknown): value is CampaignsResponse {
  return isRecord(value) && Array.isArray(value.data);
}

/**
 * Fetch the first page of campaigns for the org named in the headers.
 */
export async function fetchCampaigns(
  headers: RequestHeaders,
  options: CampaignClientOptions
): Promise<Campaign[]> {
  const url = `${options.apiUrl}/campaigns?limit=${options.pageLimit}&offset=0`;

  const response = await exponentialBackoff(
    async () => {
      const res = await fetchWithTimeout(url, { headers: toHttpHeaders(headers) }, options.timeout);
      const body = await res.text();

      if (!res.ok) {
        throw new ApiError(res.status, body, `Fetch campaigns failed (${res.status})`);
      }

      return body;
    },
    {
      retries: options.maxRetries,
      baseDelay: options.retryBaseDelay,
      // client errors won't fix themselves
      shouldRetry: (error) => !(error instanceof ApiError && error.status < 500),
    }
  );

  const data: unknown = JSON.parse(response);
  if (!isCampaignsResponse(data)) {
    throw new Error('Unexpected campaigns response shape');
  }
  return data.data;
}

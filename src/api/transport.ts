import { fetchWithTimeout } from '../utils/fetchWithTimeout';
import { exponentialBackoff } from '../utils/retry';

export interface TransportResponse {
  status: number;
  body: string;
}

/**
 * Performs the token-exchange HTTP call. Retry and timeout policy live here,
 * not in the auth stages.
 */
export interface Transport {
  postForm(url: string, form: Record<string, string>): Promise<TransportResponse>;
}

export interface HttpTransportOptions {
  timeout: number;
  maxRetries: number;
  retryBaseDelay: number;
}

class TransientResponseError extends Error {
  constructor(public readonly response: TransportResponse) {
    super(`Server responded with ${response.status}`);
  }
}

export class HttpTransport implements Transport {
  constructor(private readonly options: HttpTransportOptions) {}

  async postForm(url: string, form: Record<string, string>): Promise<TransportResponse> {
    const attempt = async (): Promise<TransportResponse> => {
      const res = await fetchWithTimeout(
        url,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
            Accept: 'application/json',
          },
          body: new URLSearchParams(form).toString(),
        },
        this.options.timeout
      );

      const response = { status: res.status, body: await res.text() };
      if (response.status >= 500) {
        throw new TransientResponseError(response);
      }
      return response;
    };

    try {
      return await exponentialBackoff(attempt, {
        retries: this.options.maxRetries,
        baseDelay: this.options.retryBaseDelay,
      });
    } catch (error) {
      // Out of retries on a 5xx: hand the last response back to the caller
      if (error instanceof TransientResponseError) {
        return error.response;
      }
      throw error;
    }
  }
}

import fetch, { FetchError } from 'node-fetch';
import type { RequestInit, Response } from 'node-fetch';

export async function fetchWithTimeout(
  url: string,
  options: RequestInit = {},
  timeout = 5000
): Promise<Response> {
  try {
    return await fetch(url, { ...options, timeout });
  } catch (err) {
    if (err instanceof FetchError && err.type === 'request-timeout') {
      throw new Error(`Request timeout after ${timeout}ms`, { cause: err });
    }
    throw err;
  }
}

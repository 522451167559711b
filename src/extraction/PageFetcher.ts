import type { AxiosInstance } from 'axios';
import { isAxiosError } from 'axios';
import { createHttpClient } from '../config/httpClient.js';
import { TransientNetworkError } from '../utils/pipelineErrors.js';

/**
 * A response status the pipeline never retries (404, 410, 403, ...)
 */
export class HttpStatusError extends Error {
  constructor(
    public readonly url: string,
    public readonly statusCode: number
  ) {
    super(`GET ${url} returned HTTP ${statusCode}`);
    this.name = 'HttpStatusError';
  }
}

export interface FetchOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Source site collaborator: given a URL, returns bytes or throws.
 * Retryable failures are thrown as TransientNetworkError.
 */
export interface PageFetcher {
  get(url: string, options?: FetchOptions): Promise<Buffer>;
}

function parseRetryAfter(value: unknown): number | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  if (typeof raw !== 'string' && typeof raw !== 'number') {
    return undefined;
  }
  const seconds = parseInt(String(raw), 10);
  return Number.isNaN(seconds) || seconds <= 0 ? undefined : seconds;
}

/**
 * axios-backed fetcher
 */
export class AxiosPageFetcher implements PageFetcher {
  private readonly client: AxiosInstance;

  constructor(options: { userAgent: string; timeoutMs: number; client?: AxiosInstance }) {
    this.client =
      options.client ??
      createHttpClient({
        timeout: options.timeoutMs,
        headers: {
          'User-Agent': options.userAgent,
          Accept: 'text/html,application/xhtml+xml',
        },
      });
  }

  async get(url: string, options: FetchOptions = {}): Promise<Buffer> {
    try {
      const response = await this.client.get<ArrayBuffer>(url, {
        signal: options.signal,
        ...(options.timeoutMs !== undefined && { timeout: options.timeoutMs }),
      });

      const status = response.status;
      if (status === 429 || status >= 500) {
        throw new TransientNetworkError(
          url,
          status,
          new Error(`HTTP ${status}`),
          parseRetryAfter(response.headers['retry-after'])
        );
      }
      if (status >= 400) {
        throw new HttpStatusError(url, status);
      }

      return Buffer.from(response.data);
    } catch (error) {
      if (error instanceof TransientNetworkError || error instanceof HttpStatusError) {
        throw error;
      }
      if (isAxiosError(error)) {
        // No usable response: connection refused/reset, DNS failure or timeout
        throw new TransientNetworkError(url, error.response?.status, error);
      }
      throw error;
    }
  }
}

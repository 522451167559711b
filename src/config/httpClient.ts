/**
 * Centralized HTTP Client Configuration
 *
 * Shared keep-alive agents and a factory for configured axios instances.
 * Retries and the politeness delay live in the extractor, not here.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import https from 'https';
import http from 'http';

export const HTTP_TIMEOUTS = {
  SHORT: 5000,
  STANDARD: 30000,
  LONG: 120000,
} as const;

const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 16,
  maxFreeSockets: 4,
  timeout: 60000,
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 16,
  maxFreeSockets: 4,
  timeout: 60000,
});

/**
 * Create a configured axios instance with connection pooling and default settings
 *
 * Responses come back as raw bytes and every status resolves, so callers
 * classify failures themselves.
 */
export function createHttpClient(config?: AxiosRequestConfig): AxiosInstance {
  return axios.create({
    timeout: HTTP_TIMEOUTS.STANDARD,
    httpAgent,
    httpsAgent,
    responseType: 'arraybuffer',
    maxRedirects: 5,
    validateStatus: () => true,
    ...config,
  });
}

/**
 * Release pooled sockets so the process can exit
 */
export function destroyHttpAgents(): void {
  httpAgent.destroy();
  httpsAgent.destroy();
}

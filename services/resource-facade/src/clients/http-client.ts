import axios, { isAxiosError, type AxiosInstance } from 'axios';
import type { Logger } from '../utils/logger.js';

export interface HttpClientOptions {
  baseURL: string;
  timeoutMs: number;
  logger: Logger;
}

/**
 * Downstream HTTP client. Built once by the client registry and shared; axios
 * instances are safe to use concurrently.
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const client = axios.create({
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    headers: {
      'Content-Type': 'application/json',
      'User-Agent': 'resource-facade/1.0.0',
    },
  });

  client.interceptors.response.use(
    (response) => response,
    (error: unknown) => {
      if (isAxiosError(error)) {
        options.logger.warn(
          {
            method: error.config?.method,
            url: error.config?.url,
            status: error.response?.status,
            code: error.code,
          },
          `Downstream request failed: ${error.message}`
        );
      }
      throw error;
    }
  );

  return client;
}

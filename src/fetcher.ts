import { setTimeout as sleep } from 'node:timers/promises';
import { request, type Dispatcher } from 'undici';
import type { ResponseCache } from './cache.js';
import { FetchError, HttpStatusError, errorMessage, toError } from './errors.js';
import type { Logger } from './logger.js';
import type { CachedResponse } from './types.js';

export const DEFAULT_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 2000;

export interface TransportRequest {
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Performs exactly one GET. Resolves with whatever status the server sent;
 * rejects only on transport failure.
 */
export type Transport = (url: string, init: TransportRequest) => Promise<CachedResponse>;

const flattenHeaders = (headers: Dispatcher.ResponseData['headers']): Record<string, string> => {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    flat[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return flat;
};

export const createUndiciTransport =
  (dispatcher?: Dispatcher): Transport =>
  async (url, init) => {
    const { statusCode, headers, body } = await request(url, {
      method: 'GET',
      headers: { ...init.headers },
      dispatcher,
    });
    const payload = Buffer.from(await body.arrayBuffer());
    return { status: statusCode, headers: flattenHeaders(headers), body: payload };
  };

export interface FetcherOptions {
  readonly cache: ResponseCache;
  readonly logger: Logger;
  readonly transport?: Transport;
  readonly attempts?: number;
  readonly retryDelayMs?: number;
}

export interface FetchOptions {
  readonly headers?: Readonly<Record<string, string>>;
  /**
   * `false` skips the cache lookup and store; retries still apply.
   */
  readonly cache?: boolean;
}

const isSuccess = (status: number): boolean => status >= 200 && status < 300;

/**
 * GET with a fixed retry budget in front of the shared response cache.
 */
export class ResilientFetcher {
  private readonly cache: ResponseCache;
  private readonly logger: Logger;
  private readonly transport: Transport;
  private readonly attempts: number;
  private readonly retryDelayMs: number;

  constructor(options: FetcherOptions) {
    this.cache = options.cache;
    this.logger = options.logger;
    this.transport = options.transport ?? createUndiciTransport();
    this.attempts = Math.max(1, options.attempts ?? DEFAULT_ATTEMPTS);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<CachedResponse> {
    const useCache = options.cache ?? true;
    if (useCache) {
      const cached = this.cache.get(url);
      if (cached) {
        this.logger.debug(`Cached: ${url}`);
        return cached;
      }
    }

    const response = await this.fetchWithRetry(url, options.headers ?? {});
    if (useCache) {
      await this.cache.put(url, response);
    }
    return response;
  }

  private async fetchWithRetry(
    url: string,
    headers: Readonly<Record<string, string>>,
  ): Promise<CachedResponse> {
    let lastError: Error = new Error('No attempt made');
    for (let attempt = 1; attempt <= this.attempts; attempt += 1) {
      try {
        const response = await this.transport(url, { headers });
        if (isSuccess(response.status)) {
          return response;
        }
        lastError = new HttpStatusError(url, response.status);
      } catch (error) {
        lastError = toError(error);
      }

      this.logger.warn(`Request failed (${attempt}/${this.attempts}) ${url}: ${lastError.message}`);
      if (attempt < this.attempts) {
        await sleep(this.retryDelayMs);
      }
    }

    throw new FetchError(url, lastError, this.attempts);
  }

  async fetchJson(url: string, options: FetchOptions = {}): Promise<unknown> {
    const response = await this.fetch(url, options);
    const text = response.body.toString('utf-8');
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new Error(`Invalid JSON from ${url}: ${errorMessage(error)}`);
    }
  }
}

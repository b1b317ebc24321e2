/**
 * Shared outbound HTTP client for provider lookups
 *
 * One instance per process; every call is bounded by a single timeout and
 * never retried. Non-2xx answers raise HttpStatusError, an expired timer
 * raises HttpTimeoutError.
 */

import { HttpStatusError, HttpTimeoutError } from '@/lib/errors';

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  /** Overrides the client-wide timeout for this call */
  timeoutMs?: number;
}

export interface HttpClient {
  getText(url: string, options?: HttpRequestOptions): Promise<string>;
  getJson(url: string, options?: HttpRequestOptions): Promise<unknown>;
  postForm(url: string, fields: Record<string, string>, options?: HttpRequestOptions): Promise<unknown>;
  postJson(url: string, body: unknown, options?: HttpRequestOptions): Promise<unknown>;
}

export interface FetchHttpClientConfig {
  timeoutMs: number;
  userAgent: string;
  fetchImpl?: typeof fetch;
}

export class FetchHttpClient implements HttpClient {
  private readonly config: FetchHttpClientConfig;

  constructor(config: FetchHttpClientConfig) {
    this.config = config;
  }

  async getText(url: string, options: HttpRequestOptions = {}): Promise<string> {
    return this.exchange(url, { method: 'GET' }, (response) => response.text(), options);
  }

  async getJson(url: string, options: HttpRequestOptions = {}): Promise<unknown> {
    return this.exchange(
      url,
      { method: 'GET', headers: { Accept: 'application/json' } },
      (response) => response.json(),
      options
    );
  }

  async postForm(url: string, fields: Record<string, string>, options: HttpRequestOptions = {}): Promise<unknown> {
    return this.exchange(
      url,
      {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams(fields).toString(),
      },
      (response) => response.json(),
      options
    );
  }

  async postJson(url: string, body: unknown, options: HttpRequestOptions = {}): Promise<unknown> {
    return this.exchange(
      url,
      {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
      },
      (response) => response.json(),
      options
    );
  }

  /**
   * The timer covers both the request and reading the body
   */
  private async exchange<T>(
    url: string,
    init: { method: string; headers?: Record<string, string>; body?: string },
    decode: (response: Response) => Promise<T>,
    options: HttpRequestOptions
  ): Promise<T> {
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const doFetch = this.config.fetchImpl ?? fetch;

    try {
      const response = await doFetch(url, {
        method: init.method,
        body: init.body,
        headers: {
          'User-Agent': this.config.userAgent,
          ...init.headers,
          ...options.headers,
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new HttpStatusError(response.status, response.statusText);
      }

      return await decode(response);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HttpTimeoutError(url, timeoutMs);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

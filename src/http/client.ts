/**
 * HTTP client for source downloads with timeout and retry logic
 */

import { withBackoff, parseRetryAfter, sleep, type BackoffOptions } from '../util/backoff.js';
import { logger } from '../util/logger.js';
import { SourceHttpError } from '../types.js';

/**
 * Default request timeout in milliseconds
 */
const DEFAULT_TIMEOUT = 30000;

// Longest Retry-After we honour before retrying
const MAX_RATE_LIMIT_WAIT_MS = 60000;

export type FetchFn = typeof fetch;

export interface SourceHttpClientOptions {
  timeoutMs?: number;
  fetchImpl?: FetchFn;
  backoff?: BackoffOptions;
  userAgent?: string;
}

export interface RequestOptions {
  params?: Record<string, string | number | undefined>;
  accept?: string;
}

/**
 * Client errors other than rate limiting will not heal on retry
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof SourceHttpError && error.statusCode !== undefined) {
    return error.statusCode === 429 || error.statusCode >= 500;
  }
  return true;
}

export class SourceHttpClient {
  private timeout: number;
  private fetchImpl: FetchFn;
  private backoff: BackoffOptions;
  private userAgent: string;

  constructor(options: SourceHttpClientOptions = {}) {
    this.timeout = options.timeoutMs ?? DEFAULT_TIMEOUT;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.backoff = options.backoff ?? {};
    this.userAgent = options.userAgent ?? 'poultry-leads-pipeline/1.0';
  }

  /**
   * GET a URL and return the body as text
   */
  async getText(url: string, options: RequestOptions = {}): Promise<string> {
    const fullUrl = buildUrl(url, options.params);
    logger.debug('Making source request', { url: redactParams(fullUrl) });

    return withBackoff(
      async () => {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.timeout);

        try {
          const response = await this.fetchImpl(fullUrl, {
            method: 'GET',
            headers: {
              Accept: options.accept ?? '*/*',
              'User-Agent': this.userAgent,
            },
            signal: controller.signal,
          });

          if (response.status === 429) {
            const retryAfter = response.headers.get('Retry-After');
            const retrySeconds = retryAfter ? parseRetryAfter(retryAfter) : undefined;
            if (retrySeconds !== undefined) {
              await (this.backoff.sleep ?? sleep)(Math.min(retrySeconds * 1000, MAX_RATE_LIMIT_WAIT_MS));
            }
            throw new SourceHttpError('Rate limited by source', 429, retrySeconds);
          }

          if (!response.ok) {
            const errorText = await response.text().catch(() => 'Unknown error');
            throw new SourceHttpError(`HTTP ${response.status}: ${errorText.slice(0, 200)}`, response.status);
          }

          const body = await response.text();
          logger.debug('Source request successful', {
            url: redactParams(fullUrl),
            status: response.status,
            bytes: body.length,
          });
          return body;
        } catch (error) {
          if (error instanceof SourceHttpError) {
            throw error;
          }
          if (error instanceof Error) {
            if (error.name === 'AbortError') {
              throw new SourceHttpError(`Request timeout after ${this.timeout}ms`);
            }
            throw new SourceHttpError(`Network error: ${error.message}`);
          }
          throw new SourceHttpError(`Unknown error: ${String(error)}`);
        } finally {
          clearTimeout(timeoutId);
        }
      },
      { shouldRetry: isRetryable, ...this.backoff }
    );
  }

  /**
   * GET a URL and parse the body as JSON
   */
  async getJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    const body = await this.getText(url, { ...options, accept: 'application/json' });
    try {
      return JSON.parse(body);
    } catch (error) {
      throw new SourceHttpError(`Invalid JSON from ${redactParams(url)}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

/**
 * Append query parameters, skipping undefined values
 */
export function buildUrl(url: string, params?: RequestOptions['params']): string {
  if (!params) {
    return url;
  }

  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      searchParams.append(key, String(value));
    }
  }

  const query = searchParams.toString();
  if (!query) {
    return url;
  }
  return `${url}${url.includes('?') ? '&' : '?'}${query}`;
}

/**
 * Hide API keys in logged URLs
 */
function redactParams(url: string): string {
  return url.replace(/([?&](?:key|api_key|token)=)[^&]+/gi, '$1***');
}

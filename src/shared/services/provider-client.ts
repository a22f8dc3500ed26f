/**
 * =============================================================================
 * PROVIDER CLIENT - Base for third-party REST APIs
 * =============================================================================
 *
 * One GET, one JSON body, one schema check. Outcomes:
 *   - 2xx + valid body        → parsed value
 *   - "not found" status      → null (404 unless the provider says otherwise)
 *   - error status whose body
 *     the caller recognises   → null
 *   - any other status,
 *     network error, timeout,
 *     unexpected body         → UpstreamServiceError (502)
 *   - no API key configured   → ServiceUnavailableError (503)
 *
 * No retries. Counters are exposed through getMetrics() for the admin stats page.
 * =============================================================================
 */

import { z } from 'zod';
import { logger } from './logger.service';
import { ServiceUnavailableError, UpstreamServiceError } from '../types/error.types';

export interface ProviderClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface ProviderMetrics {
  calls: number;
  errors: number;
  notFound: number;
  lastResponseMs: number | null;
}

interface GetJsonOptions {
  headers?: Record<string, string>;
  /** Statuses that mean "nothing matches" for this provider */
  notFoundStatuses?: number[];
  /** Error answers whose body says "nothing matches" (e.g. an unknown code sent with HTTP 400) */
  notFoundWhen?: (status: number, body: unknown) => boolean;
}

export abstract class ProviderClient {
  protected abstract readonly providerName: string;
  protected readonly apiKey: string;
  protected readonly baseUrl: string;
  protected readonly timeoutMs: number;
  private readonly metrics: ProviderMetrics = { calls: 0, errors: 0, notFound: 0, lastResponseMs: null };

  constructor(options: ProviderClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Check if the provider is usable (API key configured)
   */
  isAvailable(): boolean {
    return this.apiKey.length > 0;
  }

  getMetrics(): ProviderMetrics {
    return { ...this.metrics };
  }

  protected buildUrl(path: string, query: Record<string, string> = {}): URL {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
    return url;
  }

  protected async getJson<S extends z.ZodTypeAny>(
    url: URL,
    schema: S,
    options: GetJsonOptions = {}
  ): Promise<z.output<S> | null> {
    if (!this.isAvailable()) {
      throw new ServiceUnavailableError(`${this.providerName} is not configured`);
    }

    const notFoundStatuses = options.notFoundStatuses ?? [404];
    // Only the path is logged: query strings may carry the key
    const path = url.pathname;
    const startTime = Date.now();
    this.metrics.calls++;

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { Accept: 'application/json', ...options.headers },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      this.metrics.errors++;
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      logger.error(`${this.providerName} request failed`, {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new UpstreamServiceError(
        this.providerName,
        timedOut ? `no response within ${this.timeoutMs}ms` : 'request failed'
      );
    } finally {
      this.metrics.lastResponseMs = Date.now() - startTime;
    }

    if (notFoundStatuses.includes(response.status)) {
      this.metrics.notFound++;
      logger.debug(`${this.providerName}: nothing found`, { path, status: response.status });
      return null;
    }

    if (!response.ok && options.notFoundWhen?.(response.status, await ProviderClient.readErrorBody(response))) {
      this.metrics.notFound++;
      logger.debug(`${this.providerName}: nothing found`, { path, status: response.status });
      return null;
    }

    if (!response.ok) {
      this.metrics.errors++;
      logger.error(`${this.providerName} responded with an error`, { path, status: response.status });
      throw new UpstreamServiceError(this.providerName, `responded with HTTP ${response.status}`, {
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      this.metrics.errors++;
      logger.error(`${this.providerName} returned invalid JSON`, {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new UpstreamServiceError(this.providerName, 'returned invalid JSON');
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      this.metrics.errors++;
      logger.error(`${this.providerName} returned an unexpected payload`, {
        path,
        issues: parsed.error.issues.slice(0, 3).map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
      throw new UpstreamServiceError(this.providerName, 'returned an unexpected payload');
    }

    logger.debug(`${this.providerName} ${path} - ${Date.now() - startTime}ms`);
    return parsed.data;
  }

  private static async readErrorBody(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch {
      return null;
    }
  }
}

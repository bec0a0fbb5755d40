/**
 * JSON-over-HTTP transport for the retrieval layer
 *
 * GET only. Each attempt gets its own timeout; status, timeout, network and
 * parse failures all surface as one TransportError with a `reason`. Retrying
 * is off unless `maxRetries` is set, and then only timeouts, network errors
 * and gateway-style statuses are retried, with capped exponential backoff.
 */

import { logger } from './utils/logger.js';

export interface HTTPClientConfig {
  /** Extra attempts after the first (default 0) */
  readonly maxRetries: number;
  /** Wait before the first retry (default 1000) */
  readonly initialDelayMs: number;
  readonly backoffMultiplier: number;
  /** Upper bound of any single wait (default 30000) */
  readonly maxDelayMs: number;
  /** Per-attempt timeout (default 30000) */
  readonly timeoutMs: number;
  readonly userAgent: string;
  /** Share of each wait randomized, 0 to 1 */
  readonly jitterFactor: number;
}

const DEFAULTS: HTTPClientConfig = {
  maxRetries: 0,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  timeoutMs: 30000,
  userAgent: 'aquifer-watch/0.1',
  jitterFactor: 0.1,
};

const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

export type TransportFailure = 'status' | 'timeout' | 'network' | 'parse';

export class TransportError extends Error {
  /** Set when the server answered with a non-2xx status */
  readonly statusCode: number | undefined;

  constructor(
    readonly reason: TransportFailure,
    message: string,
    readonly url: string,
    options: { cause?: unknown; statusCode?: number } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.statusCode = options.statusCode;
  }

  get retryable(): boolean {
    if (this.reason === 'timeout' || this.reason === 'network') return true;
    return this.statusCode !== undefined && RETRYABLE_STATUSES.has(this.statusCode);
  }
}

function asError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config: Partial<HTTPClientConfig> = {}) {
    this.config = { ...DEFAULTS, ...config };
  }

  /**
   * GET `url` and parse the body as JSON
   *
   * @throws {TransportError} When the last attempt failed or the body is not JSON
   */
  async fetchJSON(url: string, signal?: AbortSignal): Promise<unknown> {
    const body = await this.getText(url, signal);
    try {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    } catch (error) {
      throw new TransportError(
        'parse',
        `Failed to parse JSON response: ${asError(error).message}`,
        url,
        { cause: error }
      );
    }
  }

  private async getText(url: string, signal: AbortSignal | undefined): Promise<string> {
    const attempts = this.config.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      try {
        const response = await this.attempt(url, signal);
        return await response.text();
      } catch (error) {
        if (!(error instanceof TransportError) || !error.retryable || attempt >= attempts) {
          throw error;
        }
        const delayMs = this.delayAfter(attempt);
        logger.warn('Request attempt failed, retrying', {
          url,
          attempt,
          attempts,
          delayMs,
          error: error.message,
        });
        await new Promise((resolve) => setTimeout(resolve, delayMs));
      }
    }
  }

  private async attempt(url: string, signal: AbortSignal | undefined): Promise<Response> {
    const timeout = new AbortController();
    const timer = setTimeout(() => timeout.abort(), this.config.timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: { 'User-Agent': this.config.userAgent, Accept: 'application/json' },
        signal: signal ? AbortSignal.any([timeout.signal, signal]) : timeout.signal,
      });
    } catch (error) {
      if (timeout.signal.aborted) {
        throw new TransportError(
          'timeout',
          `Request timeout after ${this.config.timeoutMs}ms: ${url}`,
          url,
          { cause: error }
        );
      }
      // Cancelled by the caller
      if (signal?.aborted) throw error;
      throw new TransportError('network', `Network error: ${asError(error).message}`, url, {
        cause: error,
      });
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      throw new TransportError('status', `HTTP ${response.status}: ${response.statusText}`, url, {
        statusCode: response.status,
      });
    }
    return response;
  }

  private delayAfter(attempt: number): number {
    const { initialDelayMs, backoffMultiplier, maxDelayMs, jitterFactor } = this.config;
    const base = Math.min(initialDelayMs * backoffMultiplier ** (attempt - 1), maxDelayMs);
    const jitter = (Math.random() * 2 - 1) * base * jitterFactor;
    return Math.max(0, Math.round(base + jitter));
  }
}

/**
 * Retrieval Client
 *
 * The pipeline's only way to reach the upstream service. Implementations
 * resolve a descriptor to validated records or reject with RetrievalError;
 * no other error type crosses this boundary.
 */

import type { ZodError } from 'zod';
import { HTTPClient, TransportError, type HTTPClientConfig } from '../core/http-client.js';
import { RetrievalError, errorMessage } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import {
  DEFAULT_BASE_URL,
  RESPONSE_SCHEMAS,
  endpointUrl,
  type EndpointDescriptor,
  type EndpointKind,
  type RecordsByEndpoint,
} from './endpoints.js';

const log = createLogger({ module: 'retrieval' });

export interface RetrievalClient {
  /**
   * @throws {RetrievalError} Transport failure, error status, invalid JSON or unexpected shape
   */
  fetch<K extends EndpointKind>(descriptor: EndpointDescriptor<K>): Promise<RecordsByEndpoint[K]>;
}

export interface HydrometClientOptions {
  /** Service root, e.g. `https://hydromet4api.hidrofuturo.cl/api/v1` */
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
  readonly retries?: number;
  /** Transport override (tests) */
  readonly http?: HTTPClient;
}

/**
 * HTTP implementation against the hydrogeological data service
 */
export class HydrometRetrievalClient implements RetrievalClient {
  readonly baseUrl: string;
  private readonly http: HTTPClient;

  constructor(options: HydrometClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;

    const httpConfig: Partial<HTTPClientConfig> = {
      ...(options.timeoutMs !== undefined && { timeoutMs: options.timeoutMs }),
      ...(options.retries !== undefined && { maxRetries: options.retries }),
    };
    this.http = options.http ?? new HTTPClient(httpConfig);
  }

  async fetch<K extends EndpointKind>(
    descriptor: EndpointDescriptor<K>
  ): Promise<RecordsByEndpoint[K]> {
    const url = endpointUrl(this.baseUrl, descriptor);
    const startTime = Date.now();

    let body: unknown;
    try {
      body = await this.http.fetchJSON(url);
    } catch (error) {
      log.debug('Request failed', { endpoint: descriptor.kind, url, error: errorMessage(error) });
      throw new RetrievalError(
        `${descriptor.kind} request to ${url} failed: ${errorMessage(error)}`,
        descriptor.kind,
        {
          cause: error,
          ...(error instanceof TransportError &&
            error.statusCode !== undefined && { statusCode: error.statusCode }),
        }
      );
    }

    const parsed = RESPONSE_SCHEMAS[descriptor.kind].safeParse(body);
    if (!parsed.success) {
      throw new RetrievalError(
        `${descriptor.kind} response from ${url} has an unexpected shape: ${describeIssues(parsed.error)}`,
        descriptor.kind,
        { cause: parsed.error }
      );
    }

    log.debug('Request completed', {
      endpoint: descriptor.kind,
      url,
      durationMs: Date.now() - startTime,
    });

    return parsed.data;
  }
}

/**
 * First few zod issues as `path: message`
 */
function describeIssues(error: ZodError, limit = 3): string {
  const issues = error.issues.slice(0, limit).map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
  const more = error.issues.length > limit ? ` (+${error.issues.length - limit} more)` : '';
  return issues.join('; ') + more;
}

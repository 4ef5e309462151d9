/**
 * HTTP(S) transport to the search cluster.
 *
 * This module handles:
 * - Connection pooling and keep-alive (via the OpenSearch client)
 * - The authenticated TLS session
 * - Retrying transient connection failures within a time budget
 * - Replacing the active host set after discovery
 *
 * Every call resolves to a tagged TransportResult; callers decide how a
 * failure maps onto the client's error taxonomy.
 */

import { Client, errors } from '@opensearch-project/opensearch';
import type { ConnectionOptions } from 'node:tls';
import {
  ConnectionError,
  InvalidResponseError,
  RetryExhaustedError,
  type ShardScrollError,
} from '@shardscroll/client/errors';
import { withRetry } from '@shardscroll/client/retry';
import type { Logger, RetryConfig } from '@shardscroll/client/types';

const SCROLL_PATH = '/_search/scroll';

/**
 * Why a request failed.
 */
export type TransportFailure =
  /** The cluster answered with an error status */
  | { kind: 'response'; statusCode: number; body: unknown; cause: Error }
  /** No usable answer: refused, reset, timed out, no living connection */
  | { kind: 'connection'; cause: Error }
  /** An answer arrived but could not be deserialized */
  | { kind: 'invalid-response'; cause: Error };

export type TransportResult =
  | { ok: true; body: unknown }
  | { ok: false; failure: TransportFailure };

/**
 * Initial single-shard scroll search.
 */
export interface SearchRequest {
  index: string;
  /** Routing preference, e.g. "_shards:3" */
  preference: string;
  /** Scroll lease, e.g. "60000ms" */
  scroll: string;
  body: Record<string, unknown>;
}

/**
 * Follow-up page fetch for an open scroll.
 */
export interface ScrollRequest {
  scrollId: string;
  scroll: string;
}

export interface RequestOptions {
  /** Overrides the configured request timeout */
  timeoutMs?: number;

  /** Query string parameters */
  querystring?: Record<string, string>;
}

/**
 * Requests the rest of the client issues against the cluster.
 */
export interface ClusterTransport {
  get(path: string, options?: RequestOptions): Promise<TransportResult>;
  search(request: SearchRequest): Promise<TransportResult>;
  scroll(request: ScrollRequest): Promise<TransportResult>;
  clearScroll(scrollId: string): Promise<TransportResult>;
}

/**
 * Configuration for the transport.
 */
export interface TransportOptions {
  /** Initial node URLs, e.g. "http://localhost:9200" */
  hosts: string[];

  /** Per-request timeout in milliseconds */
  requestTimeoutMs: number;

  /** Time budget for retrying transient failures */
  maxRetryTimeMs: number;

  retry: Required<RetryConfig>;

  /** TLS options for https hosts */
  ssl?: ConnectionOptions;

  logger: Logger;
}

/**
 * Whether an error from the OpenSearch client is a transient connection
 * failure.
 */
export function isTransientFailure(error: Error): boolean {
  return (
    error instanceof errors.ConnectionError ||
    error instanceof errors.TimeoutError ||
    error instanceof errors.NoLivingConnectionsError
  );
}

/**
 * Map an error thrown while executing a request onto a TransportFailure.
 */
export function classifyFailure(err: unknown): TransportFailure {
  if (err instanceof RetryExhaustedError) {
    return { kind: 'connection', cause: err.lastError ?? err };
  }
  if (err instanceof errors.ResponseError) {
    return { kind: 'response', statusCode: err.statusCode, body: err.body, cause: err };
  }
  if (err instanceof errors.DeserializationError) {
    return { kind: 'invalid-response', cause: err };
  }
  return { kind: 'connection', cause: err instanceof Error ? err : new Error(String(err)) };
}

/**
 * Turn a failure into the error surfaced to callers.
 *
 * @param operation - Short description used in the message, e.g. "GET /_nodes/http"
 */
export function failureToError(failure: TransportFailure, operation: string): ShardScrollError {
  switch (failure.kind) {
    case 'response':
      return new ConnectionError(
        `${operation} failed with status ${failure.statusCode}`,
        undefined,
        { cause: failure.cause }
      );
    case 'invalid-response':
      return new InvalidResponseError(`${operation} returned an unreadable body`, { cause: failure.cause });
    case 'connection':
      return new ConnectionError(`${operation} failed: ${failure.cause.message}`, undefined, {
        cause: failure.cause,
      });
  }
}

/**
 * Resolve a result to its body, throwing the mapped error on failure.
 */
export function expectBody(result: TransportResult, operation: string): unknown {
  if (!result.ok) {
    throw failureToError(result.failure, operation);
  }
  return result.body;
}

/**
 * ClusterTransport backed by the OpenSearch client.
 *
 * The host list is replaced once after discovery and is read-only after
 * that; the underlying pool is shared by all concurrent callers.
 */
export class HttpTransport implements ClusterTransport {
  private readonly client: Client;
  private hosts: string[];

  constructor(private readonly options: TransportOptions) {
    this.hosts = [...options.hosts];
    this.client = new Client({
      nodes: this.hosts,
      ssl: options.ssl,
      requestTimeout: options.requestTimeoutMs,
      // Retries are budgeted by withRetry instead
      maxRetries: 0,
      resurrectStrategy: 'optimistic',
    });
  }

  async get(path: string, options: RequestOptions = {}): Promise<TransportResult> {
    return this.execute(`GET ${path}`, true, () =>
      this.client.transport.request(
        { method: 'GET', path, querystring: options.querystring },
        { requestTimeout: options.timeoutMs ?? this.options.requestTimeoutMs }
      )
    );
  }

  async search(request: SearchRequest): Promise<TransportResult> {
    return this.execute(`search ${request.index}`, true, () =>
      this.client.transport.request({
        method: 'POST',
        path: `/${encodeURIComponent(request.index)}/_search`,
        querystring: {
          preference: request.preference,
          scroll: request.scroll,
          search_type: 'query_then_fetch',
        },
        body: request.body,
      })
    );
  }

  async scroll(request: ScrollRequest): Promise<TransportResult> {
    // The server may have advanced the cursor before a failure, so a page
    // fetch is never repeated.
    return this.execute('scroll', false, () =>
      this.client.transport.request({
        method: 'POST',
        path: SCROLL_PATH,
        body: { scroll_id: request.scrollId, scroll: request.scroll },
      })
    );
  }

  async clearScroll(scrollId: string): Promise<TransportResult> {
    return this.execute('clear scroll', true, () =>
      this.client.transport.request({
        method: 'DELETE',
        path: SCROLL_PATH,
        body: { scroll_id: [scrollId] },
      })
    );
  }

  /**
   * Replace the set of nodes requests are spread over.
   *
   * @param urls - Node URLs, e.g. "https://10.0.0.4:9200"
   */
  setHosts(urls: string[]): void {
    const pool = this.client.connectionPool;
    pool.update(urls.map((url) => ({ ...pool.urlToHost(url), id: url })));
    this.hosts = [...urls];
  }

  /**
   * Current node URLs.
   */
  getHosts(): string[] {
    return [...this.hosts];
  }

  /**
   * Close all pooled connections.
   */
  async close(): Promise<void> {
    await this.client.close();
  }

  private async execute(
    operation: string,
    isIdempotent: boolean,
    call: () => Promise<{ body: unknown }>
  ): Promise<TransportResult> {
    try {
      const response = await withRetry(
        ({ attempt }) => {
          if (attempt > 1) {
            this.options.logger.debug(`${operation} attempt ${attempt}`);
          }
          return call();
        },
        {
          backoff: this.options.retry,
          budgetMs: this.options.maxRetryTimeMs,
          isTransient: isTransientFailure,
          onRetry: ({ attempt, delayMs, error }) => {
            this.options.logger.warn(
              `${operation} failed (attempt ${attempt}), retrying in ${Math.round(delayMs)}ms: ${error.message}`
            );
          },
        },
        { isIdempotent }
      );
      return { ok: true, body: response.body };
    } catch (err) {
      return { ok: false, failure: classifyFailure(err) };
    }
  }
}

/**
 * Single-shard scroll searches.
 *
 * A scroll moves through `not-started -> open -> cleared`: the initial
 * search opens a server-side cursor, page fetches renew it, and a clear
 * releases it. Cursors are owned by one caller at a time.
 */

import { decodeErrorReason, decodeScrollPage } from '@shardscroll/client/decoder';
import { ClientStateError, QueryFailureError, type ShardScrollError } from '@shardscroll/client/errors';
import {
  failureToError,
  type ClusterTransport,
  type TransportFailure,
  type TransportResult,
} from '@shardscroll/client/transport';
import type {
  BeginSearchOptions,
  Logger,
  ScrollCursor,
  ScrollPage,
  SearchHit,
} from '@shardscroll/client/types';

/**
 * Page size and lease, fixed for the lifetime of a protocol instance.
 */
export interface ScrollSettings {
  scrollSize: number;
  scrollTimeoutMs: number;
}

/**
 * Routing preference that pins a search to one shard.
 */
export function preferenceForShard(shardNumber: number): string {
  return `_shards:${shardNumber}`;
}

/**
 * Scroll lease in the cluster's time-unit syntax.
 */
export function scrollLease(timeoutMs: number): string {
  return `${timeoutMs}ms`;
}

/**
 * Body of the initial search request.
 *
 * `fields` undefined leaves `_source` out so every source field comes back;
 * an empty list disables the source; a non-empty list includes exactly
 * those fields.
 */
export function buildSearchBody(
  options: Pick<BeginSearchOptions, 'query' | 'fields' | 'docValueFields'>,
  scrollSize: number
): Record<string, unknown> {
  const body: Record<string, unknown> = {
    query: options.query,
    size: scrollSize,
  };

  if (options.fields !== undefined) {
    body._source = options.fields.length === 0 ? false : { includes: [...options.fields] };
  }
  if (options.docValueFields !== undefined) {
    body.docvalue_fields = [...options.docValueFields];
  }

  return body;
}

/**
 * Map a failed search or scroll onto the error surfaced to callers.
 *
 * An error status carrying `error.root_cause[0].reason` is a query failure;
 * everything else is a transport failure.
 */
export function extractFailure(failure: TransportFailure, operation: string): ShardScrollError {
  if (failure.kind === 'response') {
    const reason = decodeErrorReason(failure.body);
    if (reason.kind === 'query-failure') {
      return new QueryFailureError(reason.reason, { cause: failure.cause });
    }
  }
  return failureToError(failure, operation);
}

function expectPage(result: TransportResult, operation: string): ScrollPage {
  if (!result.ok) {
    throw extractFailure(result.failure, operation);
  }
  return decodeScrollPage(result.body);
}

/**
 * Issues scroll searches against the cluster.
 */
export class ScrollSearchProtocol {
  constructor(
    private readonly transport: ClusterTransport,
    private readonly settings: ScrollSettings,
    private readonly logger: Logger
  ) {}

  /**
   * Start a scroll over one shard and return the first page.
   *
   * @throws QueryFailureError if the cluster rejects the query
   * @throws ConnectionError if the cluster cannot be reached
   * @throws InvalidResponseError if the response cannot be decoded
   */
  async beginSearch(options: BeginSearchOptions): Promise<ScrollPage> {
    const result = await this.transport.search({
      index: options.index,
      preference: preferenceForShard(options.shardNumber),
      scroll: scrollLease(this.settings.scrollTimeoutMs),
      body: buildSearchBody(options, this.settings.scrollSize),
    });
    return expectPage(result, `search ${options.index} shard ${options.shardNumber}`);
  }

  /**
   * Fetch the next page of an open scroll. An empty page means the scroll
   * is exhausted; the returned cursor replaces the one passed in.
   */
  async nextPage(cursor: ScrollCursor): Promise<ScrollPage> {
    const result = await this.transport.scroll({
      scrollId: cursor,
      scroll: scrollLease(this.settings.scrollTimeoutMs),
    });
    return expectPage(result, 'scroll');
  }

  /**
   * Release a scroll cursor. Pages already fetched are unaffected by a
   * failure here.
   *
   * @throws ConnectionError if the cluster cannot be reached
   */
  async clearScroll(cursor: ScrollCursor): Promise<void> {
    const result = await this.transport.clearScroll(cursor);
    if (!result.ok) {
      throw failureToError(result.failure, 'clear scroll');
    }
  }

  /**
   * A session for one shard; nothing is sent until the first next().
   */
  openSession(options: BeginSearchOptions): ScrollSession {
    return new ScrollSession(this, options);
  }

  /**
   * Yield every non-empty batch of hits from one shard, then clear the
   * cursor. The cursor is also cleared when the consumer stops early or a
   * fetch fails; a failed clear is logged.
   */
  async *scanShard(options: BeginSearchOptions): AsyncGenerator<SearchHit[], void, undefined> {
    const session = this.openSession(options);
    try {
      for (;;) {
        const page = await session.next();
        if (page.hits.length === 0) {
          return;
        }
        yield page.hits;
      }
    } finally {
      try {
        await session.clear();
      } catch (err) {
        this.logger.warn(
          `Failed to clear scroll on ${options.index} shard ${options.shardNumber}: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    }
  }
}

export type ScrollState = 'not-started' | 'open' | 'cleared';

/**
 * Tracks the cursor of one scroll so callers do not have to.
 */
export class ScrollSession {
  private state: ScrollState = 'not-started';
  private cursor: ScrollCursor | undefined;

  constructor(
    private readonly protocol: ScrollSearchProtocol,
    private readonly options: BeginSearchOptions
  ) {}

  get currentState(): ScrollState {
    return this.state;
  }

  /**
   * The latest cursor, undefined before the first page and after clear.
   */
  get scrollId(): ScrollCursor | undefined {
    return this.cursor;
  }

  /**
   * Fetch the next page: the initial search on the first call, a page
   * fetch afterwards.
   *
   * @throws ClientStateError after clear()
   */
  async next(): Promise<ScrollPage> {
    if (this.state === 'cleared') {
      throw new ClientStateError('Scroll has already been cleared');
    }

    const page = this.cursor === undefined
      ? await this.protocol.beginSearch(this.options)
      : await this.protocol.nextPage(this.cursor);

    this.cursor = page.scrollId;
    this.state = 'open';
    return page;
  }

  /**
   * Release the cursor. The session is cleared even when the release
   * fails; calling clear() again is a no-op.
   */
  async clear(): Promise<void> {
    const cursor = this.cursor;
    this.state = 'cleared';
    this.cursor = undefined;

    if (cursor !== undefined) {
      await this.protocol.clearScroll(cursor);
    }
  }
}

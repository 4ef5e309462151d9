/**
 * Main shardscroll client implementation.
 *
 * This is the primary entry point for reading an index shard by shard.
 */

import type { ConnectionOptions } from 'node:tls';
import { resolveConfig, schemeFor, type ResolvedConfig } from '@shardscroll/client/config';
import { decodeIndexMetadata, decodeIndexNames } from '@shardscroll/client/decoder';
import { ClientStateError, NoNodesAvailableError } from '@shardscroll/client/errors';
import { ShardRouter } from '@shardscroll/client/router';
import { ScrollSearchProtocol, type ScrollSession } from '@shardscroll/client/scroll';
import { buildTlsContext } from '@shardscroll/client/security';
import { TopologyDiscovery, nodeUrls, NODES_PATH } from '@shardscroll/client/topology';
import { HttpTransport, expectBody } from '@shardscroll/client/transport';
import type {
  BeginSearchOptions,
  ClusterNode,
  ElasticsearchConfig,
  IndexMetadata,
  ScrollCursor,
  ScrollPage,
  SearchHit,
  ShardAssignment,
} from '@shardscroll/client/types';

export const INDICES_PATH = '/_cat/indices';

/**
 * Shard-aware scroll client.
 *
 * @example
 * ```ts
 * const client = new ElasticsearchClient({ host: 'localhost', scrollSize: 500 });
 * await client.connect();
 *
 * for (const { shardNumber } of await client.getSearchShards('orders')) {
 *   for await (const hits of client.scanShard({
 *     index: 'orders',
 *     shardNumber,
 *     query: { match_all: {} },
 *   })) {
 *     console.log(hits.length);
 *   }
 * }
 *
 * await client.close();
 * ```
 */
export class ElasticsearchClient {
  private readonly config: ResolvedConfig;
  private readonly transport: HttpTransport;
  private readonly topology: TopologyDiscovery;
  private readonly router: ShardRouter;
  private readonly scroll: ScrollSearchProtocol;
  private initialized = false;
  private closed = false;

  /**
   * @throws InvalidArgumentError if the configuration is invalid
   * @throws SslInitializationError if TLS is enabled and the stores cannot be loaded
   */
  constructor(config: ElasticsearchConfig) {
    this.config = resolveConfig(config);

    let ssl: ConnectionOptions | undefined;
    if (this.config.tlsEnabled) {
      ssl = { ...buildTlsContext(this.config)?.connectionOptions };
      if (!this.config.verifyHostnames) {
        ssl.checkServerIdentity = () => undefined;
      }
    }

    this.transport = new HttpTransport({
      hosts: [`${schemeFor(this.config)}://${this.config.host}:${this.config.port}`],
      requestTimeoutMs: this.config.requestTimeoutMs,
      maxRetryTimeMs: this.config.maxRetryTimeMs,
      retry: this.config.retry,
      ssl,
      logger: this.config.logger,
    });

    this.topology = new TopologyDiscovery(this.transport);
    this.router = new ShardRouter(this.transport, this.topology, this.config.logger);
    this.scroll = new ScrollSearchProtocol(this.transport, this.config, this.config.logger);
  }

  /**
   * Discover the data nodes and spread requests over them.
   *
   * The discovery request goes to the seed host and is bounded by
   * connectTimeoutMs. Calling connect() again is a no-op.
   *
   * @throws ConnectionError if the seed host cannot be reached
   * @throws NoNodesAvailableError if the cluster reports no data nodes
   */
  async connect(): Promise<void> {
    if (this.closed) {
      throw new ClientStateError('Client is closed.');
    }
    if (this.initialized) {
      return;
    }

    const nodes = await this.topology.getNodes({ timeoutMs: this.config.connectTimeoutMs });
    if (nodes.size === 0) {
      throw new NoNodesAvailableError(`${NODES_PATH} reported no data nodes`);
    }

    const urls = nodeUrls(nodes.values(), schemeFor(this.config));
    this.transport.setHosts(urls);
    this.config.logger.info(`Discovered ${urls.length} data node(s): ${urls.join(', ')}`);

    this.initialized = true;
  }

  /**
   * Current data nodes keyed by node ID.
   */
  async getNodes(): Promise<Map<string, ClusterNode>> {
    this.ensureInitialized();
    return this.topology.getNodes();
  }

  /**
   * One assignment per logical shard of `index`, replicas preferred.
   */
  async getSearchShards(index: string): Promise<ShardAssignment[]> {
    this.ensureInitialized();
    return this.router.getSearchShards(index);
  }

  /**
   * Names of all indexes, in ascending order.
   */
  async getIndexes(): Promise<string[]> {
    this.ensureInitialized();
    const result = await this.transport.get(INDICES_PATH, {
      querystring: { h: 'index', format: 'json', s: 'index:asc' },
    });
    return decodeIndexNames(expectBody(result, `GET ${INDICES_PATH}`));
  }

  /**
   * Field schema of `index`.
   */
  async getIndexMetadata(index: string): Promise<IndexMetadata> {
    this.ensureInitialized();
    const path = `/${encodeURIComponent(index)}/_mappings`;
    return decodeIndexMetadata(expectBody(await this.transport.get(path), `GET ${path}`), index);
  }

  /**
   * Start a scroll over one shard and return its first page.
   *
   * @throws QueryFailureError if the cluster rejects the query
   */
  async beginSearch(options: BeginSearchOptions): Promise<ScrollPage> {
    this.ensureInitialized();
    return this.scroll.beginSearch(options);
  }

  /**
   * Next page of an open scroll.
   */
  async nextPage(cursor: ScrollCursor): Promise<ScrollPage> {
    this.ensureInitialized();
    return this.scroll.nextPage(cursor);
  }

  /**
   * Release a scroll cursor.
   */
  async clearScroll(cursor: ScrollCursor): Promise<void> {
    this.ensureInitialized();
    return this.scroll.clearScroll(cursor);
  }

  /**
   * A scroll session over one shard that tracks its own cursor.
   */
  openScroll(options: BeginSearchOptions): ScrollSession {
    this.ensureInitialized();
    return this.scroll.openSession(options);
  }

  /**
   * Every non-empty batch of hits from one shard; the cursor is cleared
   * when iteration ends for any reason.
   */
  scanShard(options: BeginSearchOptions): AsyncGenerator<SearchHit[], void, undefined> {
    this.ensureInitialized();
    return this.scroll.scanShard(options);
  }

  /**
   * Node URLs requests are currently spread over.
   */
  getHosts(): string[] {
    return this.transport.getHosts();
  }

  /**
   * Close the client and release all pooled connections.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.initialized = false;

    await this.transport.close();
  }

  /**
   * Check if the client is connected.
   */
  isConnected(): boolean {
    return this.initialized && !this.closed;
  }

  private ensureInitialized(): void {
    if (this.closed) {
      throw new ClientStateError('Client is closed.');
    }
    if (!this.initialized) {
      throw new ClientStateError('Client not initialized. Call connect() first.');
    }
  }
}

/**
 * Create a client and connect it. The client is closed again if connecting
 * fails.
 */
export async function createClient(config: ElasticsearchConfig): Promise<ElasticsearchClient> {
  const client = new ElasticsearchClient(config);
  try {
    await client.connect();
  } catch (err) {
    await client.close();
    throw err;
  }
  return client;
}

/**
 * TypeScript type definitions for the shardscroll client.
 */

/**
 * A data-holding cluster node.
 */
export interface ClusterNode {
  /** Node ID as reported by the cluster */
  readonly id: string;

  /** HTTP publish address (host:port) */
  readonly address: string;
}

/**
 * One copy (primary or replica) of a logical shard, as reported by the
 * cluster's shard placement API.
 */
export interface ShardCandidate {
  /** Shard number within the index */
  readonly shardNumber: number;

  /** Whether this copy is the primary */
  readonly isPrimary: boolean;

  /** Node holding this copy, or null when unassigned */
  readonly nodeId: string | null;
}

/**
 * All copies of one logical shard.
 */
export type ShardGroup = readonly ShardCandidate[];

/**
 * Final routing decision for one logical shard.
 */
export interface ShardAssignment {
  readonly shardNumber: number;
  readonly nodeAddress: string;
}

/**
 * Field type in an index mapping.
 */
export type FieldType = PrimitiveType | DateTimeType | ObjectType;

export interface PrimitiveType {
  readonly kind: 'primitive';
  /** Mapping type name, e.g. "keyword", "long", "nested" */
  readonly name: string;
}

export interface DateTimeType {
  readonly kind: 'datetime';
  /** Format patterns in declaration order; empty means the cluster default */
  readonly formats: readonly string[];
}

export interface ObjectType {
  readonly kind: 'object';
  readonly fields: readonly Field[];
}

/**
 * A named field in an index mapping.
 */
export interface Field {
  readonly name: string;
  readonly type: FieldType;
}

/**
 * Field schema of one index.
 */
export interface IndexMetadata {
  readonly schema: ObjectType;
}

/**
 * Search query body in the cluster's query DSL.
 */
export type QueryDsl = Record<string, unknown>;

/**
 * Opaque server-side pagination handle.
 */
export type ScrollCursor = string;

/**
 * A single search hit.
 */
export interface SearchHit {
  index: string;
  id: string;
  score: number | null;

  /** Projected document source, absent when no source was requested */
  source?: Record<string, unknown>;

  /** Doc-value fields, keyed by field name */
  fields?: Record<string, unknown[]>;
}

/**
 * One batch of a scroll search.
 */
export interface ScrollPage {
  /** Cursor to pass to the next page fetch (may differ from the previous one) */
  scrollId: ScrollCursor;

  /** Hits in this batch; an empty batch means the scroll is exhausted */
  hits: SearchHit[];

  /** Total matching documents, when the cluster reports it */
  totalHits: number | null;
}

/**
 * Options for starting a single-shard scroll search.
 */
export interface BeginSearchOptions {
  /** Index to search */
  index: string;

  /** Shard the search is constrained to */
  shardNumber: number;

  /** Query DSL (the value of the request body's "query" key) */
  query: QueryDsl;

  /**
   * Source projection: undefined projects every source field, an empty list
   * projects none, a non-empty list projects exactly those fields.
   */
  fields?: readonly string[];

  /** Doc-value fields requested verbatim, regardless of projection */
  docValueFields?: readonly string[];
}

/**
 * Diagnostic sink used by the client.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Configuration for ElasticsearchClient.
 */
export interface ElasticsearchConfig {
  /** Seed host name (required) */
  host: string;

  /** Seed HTTP port (default: 9200) */
  port?: number;

  /** Connect over HTTPS (default: false) */
  tlsEnabled?: boolean;

  /** Timeout for the discovery request issued by connect() (default: 1000) */
  connectTimeoutMs?: number;

  /** Per-request timeout in milliseconds (default: 10000) */
  requestTimeoutMs?: number;

  /** Total time budget for retrying transient connection failures (default: 20000) */
  maxRetryTimeMs?: number;

  /** Hits per scroll page (default: 1000) */
  scrollSize?: number;

  /** Scroll lease duration in milliseconds (default: 60000) */
  scrollTimeoutMs?: number;

  /** Verify server host names against their certificates (default: true) */
  verifyHostnames?: boolean;

  /** PEM or PKCS#12 file holding the client key and certificate chain */
  keystorePath?: string;

  /** Key password (PEM) or store password (PKCS#12) */
  keystorePassword?: string;

  /** PEM or PKCS#12 file holding trusted certificates */
  truststorePath?: string;

  /** Store password for a PKCS#12 trust store */
  truststorePassword?: string;

  /** Backoff tuning for transient failure retries */
  retry?: RetryConfig;

  /** Diagnostic sink (default: console) */
  logger?: Logger;
}

/**
 * Backoff configuration for transient failure retries. The total time spent
 * retrying is bounded by ElasticsearchConfig.maxRetryTimeMs.
 */
export interface RetryConfig {
  /** Initial backoff delay in milliseconds (default: 50) */
  initialDelayMs?: number;

  /** Maximum backoff delay in milliseconds (default: 2000) */
  maxDelayMs?: number;

  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number;

  /** Maximum jitter in milliseconds (default: 25) */
  jitterMs?: number;
}

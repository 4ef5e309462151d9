/**
 * shardscroll TypeScript Client
 *
 * Reads an index shard by shard over scroll searches, routing each shard to
 * a node that holds a copy of it.
 *
 * @example
 * ```ts
 * import { createClient } from '@shardscroll/client';
 *
 * const client = await createClient({ host: 'localhost' });
 *
 * const [shard] = await client.getSearchShards('orders');
 * const page = await client.beginSearch({
 *   index: 'orders',
 *   shardNumber: shard.shardNumber,
 *   query: { match_all: {} },
 * });
 * await client.clearScroll(page.scrollId);
 *
 * await client.close();
 * ```
 *
 * @packageDocumentation
 */

// Main client
export { ElasticsearchClient, createClient } from '@shardscroll/client/client';

// Scroll sessions
export {
  ScrollSession,
  buildSearchBody,
  type ScrollState,
} from '@shardscroll/client/scroll';

// Routing
export { orderByPreference, routeShardGroup } from '@shardscroll/client/router';

// Types
export type {
  BeginSearchOptions,
  ClusterNode,
  DateTimeType,
  ElasticsearchConfig,
  Field,
  FieldType,
  IndexMetadata,
  Logger,
  ObjectType,
  PrimitiveType,
  QueryDsl,
  RetryConfig,
  ScrollCursor,
  ScrollPage,
  SearchHit,
  ShardAssignment,
  ShardCandidate,
  ShardGroup,
} from '@shardscroll/client/types';

// Errors
export {
  ShardScrollError,
  ConnectionError,
  InvalidResponseError,
  QueryFailureError,
  SslInitializationError,
  CertificateValidityError,
  InvalidArgumentError,
  NoNodesAvailableError,
  RetryExhaustedError,
  ClientStateError,
  type CertificateCheck,
} from '@shardscroll/client/errors';

// Configuration
export { DEFAULT_CONFIG, resolveConfig } from '@shardscroll/client/config';

// Date format helpers
export { splitDateFormats, joinDateFormats } from '@shardscroll/client/decoder';

// Version constant
export const VERSION = '0.1.0';

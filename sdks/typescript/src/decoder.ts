/**
 * Decoders from raw cluster JSON into client types.
 *
 * Every decoder takes the parsed response body as `unknown` and either
 * returns a typed value or throws InvalidResponseError. Decoders hold no
 * state and are safe to share between concurrent callers.
 */

import { InvalidResponseError } from '@shardscroll/client/errors';
import type {
  ClusterNode,
  Field,
  IndexMetadata,
  ObjectType,
  ScrollPage,
  SearchHit,
  ShardCandidate,
  ShardGroup,
} from '@shardscroll/client/types';

/**
 * Separator between date format patterns in a mapping's "format" value.
 */
export const DATE_FORMAT_SEPARATOR = '||';

/**
 * Role a node must advertise to be routed to.
 */
export const DATA_ROLE = 'data';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, what: string): JsonObject {
  if (!isObject(value)) {
    throw new InvalidResponseError(`Expected ${what} to be an object`);
  }
  return value;
}

function expectArray(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new InvalidResponseError(`Expected ${what} to be an array`);
  }
  return value;
}

function expectString(value: unknown, what: string): string {
  if (typeof value !== 'string') {
    throw new InvalidResponseError(`Expected ${what} to be a string`);
  }
  return value;
}

/**
 * A node entry of a node-info response, before role filtering.
 */
export interface NodeInfo {
  id: string;
  roles: string[];
  /** HTTP publish address, null when the node has no HTTP layer */
  address: string | null;
}

/**
 * Decode a `_nodes/http` response into its node entries, in response order.
 */
export function decodeNodeInfos(body: unknown): NodeInfo[] {
  const nodes = expectObject(expectObject(body, 'nodes response').nodes, 'nodes');

  return Object.entries(nodes).map(([id, value]) => {
    const node = expectObject(value, `node ${id}`);
    const roles = expectArray(node.roles, `roles of node ${id}`).map((role) =>
      expectString(role, `role of node ${id}`)
    );
    const http = node.http;
    const address = isObject(http)
      ? expectString(http.publish_address, `publish address of node ${id}`)
      : null;

    return { id, roles, address };
  });
}

/**
 * Decode a `_nodes/http` response into the data-holding nodes, keyed by ID.
 */
export function decodeDataNodes(body: unknown): Map<string, ClusterNode> {
  const result = new Map<string, ClusterNode>();

  for (const info of decodeNodeInfos(body)) {
    if (!info.roles.includes(DATA_ROLE)) {
      continue;
    }
    if (info.address === null) {
      throw new InvalidResponseError(`Data node ${info.id} has no HTTP publish address`);
    }
    result.set(info.id, { id: info.id, address: info.address });
  }

  return result;
}

/**
 * Decode a `<index>/_search_shards` response into shard groups.
 */
export function decodeShardGroups(body: unknown): ShardGroup[] {
  const groups = expectArray(expectObject(body, 'search shards response').shards, 'shards');

  return groups.map((group, groupIndex) => {
    const copies = expectArray(group, `shard group ${groupIndex}`);
    if (copies.length === 0) {
      throw new InvalidResponseError(`Shard group ${groupIndex} has no copies`);
    }

    return copies.map((copy): ShardCandidate => {
      const shard = expectObject(copy, `shard copy in group ${groupIndex}`);
      const shardNumber = shard.shard;
      if (typeof shardNumber !== 'number' || !Number.isInteger(shardNumber)) {
        throw new InvalidResponseError(`Expected shard number in group ${groupIndex} to be an integer`);
      }
      const primary = shard.primary;
      if (typeof primary !== 'boolean') {
        throw new InvalidResponseError(`Expected primary flag in group ${groupIndex} to be a boolean`);
      }
      const node = shard.node;
      let nodeId: string | null = null;
      if (typeof node === 'string') {
        nodeId = node;
      } else if (node !== null && node !== undefined) {
        throw new InvalidResponseError(`Expected node of shard copy in group ${groupIndex} to be a string`);
      }

      return { shardNumber, isPrimary: primary, nodeId };
    });
  });
}

/**
 * Decode a `_cat/indices?format=json` response into index names, keeping
 * the order the cluster returned.
 */
export function decodeIndexNames(body: unknown): string[] {
  return expectArray(body, 'index listing').map((row, i) =>
    expectString(expectObject(row, `index listing row ${i}`).index, `index name in row ${i}`)
  );
}

/**
 * Split a date field's "format" value into its patterns. Trailing empty
 * patterns are dropped; a value without a separator is returned whole.
 */
export function splitDateFormats(format: string): string[] {
  const formats = format.split(DATE_FORMAT_SEPARATOR);
  if (formats.length === 1) {
    return formats;
  }
  while (formats.length > 0 && formats[formats.length - 1] === '') {
    formats.pop();
  }
  return formats;
}

/**
 * Join date format patterns into a mapping "format" value.
 */
export function joinDateFormats(formats: readonly string[]): string {
  return formats.join(DATE_FORMAT_SEPARATOR);
}

/**
 * Walk a mapping "properties" object into an object type.
 *
 * Fields with a "type" become primitives (or datetimes for "date"); fields
 * with only "properties" become nested objects; anything else is skipped.
 */
export function decodeProperties(properties: unknown, path: string = ''): ObjectType {
  const entries = Object.entries(expectObject(properties, `properties${path ? ` of ${path}` : ''}`));
  const fields: Field[] = [];

  for (const [name, value] of entries) {
    const fieldPath = path ? `${path}.${name}` : name;
    const mapping = expectObject(value, `mapping of field ${fieldPath}`);

    if (mapping.type !== undefined) {
      const type = expectString(mapping.type, `type of field ${fieldPath}`);

      if (type === 'date') {
        const formats = mapping.format === undefined
          ? []
          : splitDateFormats(expectString(mapping.format, `format of field ${fieldPath}`));
        fields.push({ name, type: { kind: 'datetime', formats } });
      } else {
        fields.push({ name, type: { kind: 'primitive', name: type } });
      }
    } else if (mapping.properties !== undefined) {
      fields.push({ name, type: decodeProperties(mapping.properties, fieldPath) });
    }
  }

  return { kind: 'object', fields };
}

/**
 * Decode a `<index>/_mappings` response into the index's field schema.
 *
 * Mappings from clusters that still expose a mapping type nest the
 * properties one level deeper, under the type name; that layer is skipped.
 */
export function decodeIndexMetadata(body: unknown, index: string): IndexMetadata {
  const indexEntry = expectObject(expectObject(body, 'mappings response')[index], `mappings entry for index ${index}`);
  let mappings = expectObject(indexEntry.mappings, `mappings of index ${index}`);

  if (mappings.properties === undefined) {
    const [wrapped] = Object.values(mappings);
    if (wrapped === undefined) {
      return { schema: { kind: 'object', fields: [] } };
    }
    mappings = expectObject(wrapped, `mapping type of index ${index}`);
    if (mappings.properties === undefined) {
      return { schema: { kind: 'object', fields: [] } };
    }
  }

  return { schema: decodeProperties(mappings.properties) };
}

function decodeHit(value: unknown, position: number): SearchHit {
  const hit = expectObject(value, `hit ${position}`);
  const score = hit._score;

  const result: SearchHit = {
    index: expectString(hit._index, `index of hit ${position}`),
    id: expectString(hit._id, `id of hit ${position}`),
    score: typeof score === 'number' ? score : null,
  };

  if (hit._source !== undefined) {
    result.source = expectObject(hit._source, `source of hit ${position}`);
  }

  if (hit.fields !== undefined) {
    const fields: Record<string, unknown[]> = {};
    for (const [name, values] of Object.entries(expectObject(hit.fields, `fields of hit ${position}`))) {
      fields[name] = expectArray(values, `values of field ${name} in hit ${position}`);
    }
    result.fields = fields;
  }

  return result;
}

/**
 * Decode a search or scroll response into a page.
 */
export function decodeScrollPage(body: unknown): ScrollPage {
  const response = expectObject(body, 'search response');
  const scrollId = expectString(response._scroll_id, 'scroll id');
  const hits = expectObject(response.hits, 'hits');

  const total = hits.total;
  let totalHits: number | null = null;
  if (typeof total === 'number') {
    totalHits = total;
  } else if (isObject(total) && typeof total.value === 'number') {
    totalHits = total.value;
  }

  return {
    scrollId,
    hits: expectArray(hits.hits, 'hits.hits').map(decodeHit),
    totalHits,
  };
}

/**
 * Outcome of looking for a structured query failure in an error body.
 */
export type ErrorBodyReason =
  | { kind: 'query-failure'; reason: string }
  | { kind: 'unstructured' };

/**
 * Look for `error.root_cause[0].reason` in an error response body.
 *
 * The body may be the parsed JSON or the raw text; anything that does not
 * parse or lacks the reason is reported as unstructured.
 */
export function decodeErrorReason(body: unknown): ErrorBodyReason {
  let parsed = body;
  if (typeof body === 'string') {
    try {
      parsed = JSON.parse(body);
    } catch {
      return { kind: 'unstructured' };
    }
  }

  const error = isObject(parsed) ? parsed.error : undefined;
  if (!isObject(error)) {
    return { kind: 'unstructured' };
  }
  const rootCause: unknown = error.root_cause;
  const first: unknown = Array.isArray(rootCause) ? rootCause[0] : undefined;
  if (!isObject(first)) {
    return { kind: 'unstructured' };
  }

  const reason = first.reason;
  if (typeof reason === 'string' || typeof reason === 'number' || typeof reason === 'boolean') {
    return { kind: 'query-failure', reason: String(reason) };
  }
  return { kind: 'unstructured' };
}

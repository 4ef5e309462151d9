/**
 * Unit tests for response decoders.
 */

import { describe, it, expect } from 'vitest';
import {
  decodeDataNodes,
  decodeErrorReason,
  decodeIndexMetadata,
  decodeIndexNames,
  decodeNodeInfos,
  decodeScrollPage,
  decodeShardGroups,
  joinDateFormats,
  splitDateFormats,
} from '@shardscroll/client/decoder';
import { InvalidResponseError } from '@shardscroll/client/errors';

describe('Response Decoders', () => {
  describe('decodeNodeInfos', () => {
    it('should keep response order and read publish addresses', () => {
      const infos = decodeNodeInfos({
        nodes: {
          b: { roles: ['master'], http: { publish_address: '10.0.0.2:9200' } },
          a: { roles: ['data', 'ingest'], http: { publish_address: '10.0.0.1:9200' } },
          c: { roles: ['data'] },
        },
      });

      expect(infos).toEqual([
        { id: 'b', roles: ['master'], address: '10.0.0.2:9200' },
        { id: 'a', roles: ['data', 'ingest'], address: '10.0.0.1:9200' },
        { id: 'c', roles: ['data'], address: null },
      ]);
    });

    it('should reject a response without nodes', () => {
      expect(() => decodeNodeInfos({})).toThrow(InvalidResponseError);
    });
  });

  describe('decodeDataNodes', () => {
    it('should keep only nodes with the data role', () => {
      const nodes = decodeDataNodes({
        nodes: {
          n1: { roles: ['master', 'data'], http: { publish_address: '10.0.0.1:9200' } },
          n2: { roles: ['master'], http: { publish_address: '10.0.0.2:9200' } },
          n3: { roles: ['ingest', 'data'], http: { publish_address: '10.0.0.3:9200' } },
        },
      });

      expect([...nodes.keys()]).toEqual(['n1', 'n3']);
      expect(nodes.get('n3')).toEqual({ id: 'n3', address: '10.0.0.3:9200' });
    });

    it('should return an empty map when no node holds data', () => {
      const nodes = decodeDataNodes({
        nodes: { n1: { roles: ['master'], http: { publish_address: '10.0.0.1:9200' } } },
      });

      expect(nodes.size).toBe(0);
    });

    it('should reject a data node without an HTTP address', () => {
      expect(() => decodeDataNodes({ nodes: { n1: { roles: ['data'] } } })).toThrow(
        'Data node n1 has no HTTP publish address'
      );
    });

    it('should reject non-string roles', () => {
      expect(() =>
        decodeDataNodes({ nodes: { n1: { roles: [1], http: { publish_address: 'x:1' } } } })
      ).toThrow('Expected role of node n1 to be a string');
    });
  });

  describe('decodeShardGroups', () => {
    it('should decode every copy of every shard', () => {
      const groups = decodeShardGroups({
        nodes: {},
        shards: [
          [
            { shard: 0, primary: true, node: 'n1', state: 'STARTED' },
            { shard: 0, primary: false, node: 'n2', state: 'STARTED' },
          ],
          [{ shard: 1, primary: true, node: null, state: 'UNASSIGNED' }],
        ],
      });

      expect(groups).toEqual([
        [
          { shardNumber: 0, isPrimary: true, nodeId: 'n1' },
          { shardNumber: 0, isPrimary: false, nodeId: 'n2' },
        ],
        [{ shardNumber: 1, isPrimary: true, nodeId: null }],
      ]);
    });

    it('should treat a missing node as unassigned', () => {
      const [[copy]] = decodeShardGroups({ shards: [[{ shard: 4, primary: false }]] });

      expect(copy.nodeId).toBeNull();
    });

    it('should reject an empty shard group', () => {
      expect(() => decodeShardGroups({ shards: [[]] })).toThrow('Shard group 0 has no copies');
    });

    it('should reject a non-integer shard number', () => {
      expect(() => decodeShardGroups({ shards: [[{ shard: '0', primary: true, node: 'n1' }]] })).toThrow(
        InvalidResponseError
      );
    });
  });

  describe('decodeIndexNames', () => {
    it('should keep the order the cluster returned', () => {
      expect(decodeIndexNames([{ index: 'alpha' }, { index: 'beta' }, { index: 'gamma' }])).toEqual([
        'alpha',
        'beta',
        'gamma',
      ]);
    });

    it('should reject rows without an index name', () => {
      expect(() => decodeIndexNames([{ health: 'green' }])).toThrow('Expected index name in row 0 to be a string');
    });
  });

  describe('date formats', () => {
    it('should split on the literal double pipe', () => {
      expect(splitDateFormats('yyyy-MM-dd||epoch_millis')).toEqual(['yyyy-MM-dd', 'epoch_millis']);
    });

    it('should drop trailing empty patterns', () => {
      expect(splitDateFormats('yyyy-MM-dd||')).toEqual(['yyyy-MM-dd']);
      expect(splitDateFormats('yyyy-MM-dd||||')).toEqual(['yyyy-MM-dd']);
    });

    it('should keep empty patterns between separators', () => {
      expect(splitDateFormats('yyyy||||epoch_millis')).toEqual(['yyyy', '', 'epoch_millis']);
    });

    it('should not treat a single pipe as a separator', () => {
      expect(splitDateFormats('yyyy|MM')).toEqual(['yyyy|MM']);
    });

    it('should join back to the original value', () => {
      const format = 'strict_date_optional_time||epoch_second||yyyy/MM/dd';
      expect(joinDateFormats(splitDateFormats(format))).toBe(format);
    });
  });

  describe('decodeIndexMetadata', () => {
    const properties = {
      title: { type: 'text' },
      created: { type: 'date', format: 'yyyy-MM-dd||epoch_millis' },
      updated: { type: 'date' },
      author: {
        properties: {
          name: { type: 'keyword' },
          joined: { type: 'date', format: 'epoch_second' },
        },
      },
      comments: { type: 'nested', properties: { body: { type: 'text' } } },
      alias_only: { path: 'title' },
    };

    const expectedSchema = {
      kind: 'object',
      fields: [
        { name: 'title', type: { kind: 'primitive', name: 'text' } },
        { name: 'created', type: { kind: 'datetime', formats: ['yyyy-MM-dd', 'epoch_millis'] } },
        { name: 'updated', type: { kind: 'datetime', formats: [] } },
        {
          name: 'author',
          type: {
            kind: 'object',
            fields: [
              { name: 'name', type: { kind: 'primitive', name: 'keyword' } },
              { name: 'joined', type: { kind: 'datetime', formats: ['epoch_second'] } },
            ],
          },
        },
        { name: 'comments', type: { kind: 'primitive', name: 'nested' } },
      ],
    };

    it('should walk properties into a field tree', () => {
      const metadata = decodeIndexMetadata({ books: { mappings: { properties } } }, 'books');

      expect(metadata.schema).toEqual(expectedSchema);
    });

    it('should unwrap one legacy mapping-type layer', () => {
      const metadata = decodeIndexMetadata({ books: { mappings: { _doc: { properties } } } }, 'books');

      expect(metadata.schema).toEqual(expectedSchema);
    });

    it('should decode an empty mapping to an empty object type', () => {
      const metadata = decodeIndexMetadata({ empty: { mappings: {} } }, 'empty');

      expect(metadata.schema).toEqual({ kind: 'object', fields: [] });
    });

    it('should decode a mapping type without properties to an empty object type', () => {
      const metadata = decodeIndexMetadata({ empty: { mappings: { _doc: { dynamic: 'strict' } } } }, 'empty');

      expect(metadata.schema).toEqual({ kind: 'object', fields: [] });
    });

    it('should reject a response missing the requested index', () => {
      expect(() => decodeIndexMetadata({ other: { mappings: {} } }, 'books')).toThrow(
        'Expected mappings entry for index books to be an object'
      );
    });

    it('should reject a non-string date format', () => {
      expect(() =>
        decodeIndexMetadata(
          { books: { mappings: { properties: { when: { type: 'date', format: 7 } } } } },
          'books'
        )
      ).toThrow('Expected format of field when to be a string');
    });
  });

  describe('decodeScrollPage', () => {
    it('should decode hits, cursor and total', () => {
      const page = decodeScrollPage({
        _scroll_id: 'cursor-1',
        hits: {
          total: { value: 2, relation: 'eq' },
          hits: [
            { _index: 'books', _id: '1', _score: 1.5, _source: { title: 'A' } },
            { _index: 'books', _id: '2', _score: null, fields: { year: [1999] } },
          ],
        },
      });

      expect(page).toEqual({
        scrollId: 'cursor-1',
        totalHits: 2,
        hits: [
          { index: 'books', id: '1', score: 1.5, source: { title: 'A' } },
          { index: 'books', id: '2', score: null, fields: { year: [1999] } },
        ],
      });
    });

    it('should accept a numeric total', () => {
      const page = decodeScrollPage({ _scroll_id: 'c', hits: { total: 7, hits: [] } });

      expect(page.totalHits).toBe(7);
    });

    it('should report an unknown total as null', () => {
      const page = decodeScrollPage({ _scroll_id: 'c', hits: { hits: [] } });

      expect(page.totalHits).toBeNull();
    });

    it('should reject a response without a scroll id', () => {
      expect(() => decodeScrollPage({ hits: { hits: [] } })).toThrow('Expected scroll id to be a string');
    });
  });

  describe('decodeErrorReason', () => {
    const failure = {
      error: {
        root_cause: [{ type: 'query_shard_exception', reason: 'failed to create query: unknown field' }],
        type: 'search_phase_execution_exception',
      },
      status: 400,
    };

    it('should find the first root cause reason in a parsed body', () => {
      expect(decodeErrorReason(failure)).toEqual({
        kind: 'query-failure',
        reason: 'failed to create query: unknown field',
      });
    });

    it('should parse a raw text body', () => {
      expect(decodeErrorReason(JSON.stringify(failure))).toEqual({
        kind: 'query-failure',
        reason: 'failed to create query: unknown field',
      });
    });

    it('should stringify scalar reasons', () => {
      expect(decodeErrorReason({ error: { root_cause: [{ reason: 42 }] } })).toEqual({
        kind: 'query-failure',
        reason: '42',
      });
    });

    it('should report text that is not JSON as unstructured', () => {
      expect(decodeErrorReason('<html>Bad Gateway</html>')).toEqual({ kind: 'unstructured' });
    });

    it('should report an empty root cause list as unstructured', () => {
      expect(decodeErrorReason({ error: { root_cause: [] } })).toEqual({ kind: 'unstructured' });
    });

    it('should report a plain string error as unstructured', () => {
      expect(decodeErrorReason({ error: 'IndexMissingException[[x] missing]' })).toEqual({ kind: 'unstructured' });
    });
  });
});

/**
 * Basic usage example for the shardscroll TypeScript client.
 *
 * This example demonstrates:
 * - Connecting to a cluster
 * - Listing indexes and reading a mapping
 * - Routing an index's shards to nodes
 * - Scanning every shard with scroll searches
 * - Error handling
 */

import {
  ElasticsearchClient,
  QueryFailureError,
  type FieldType,
} from '../src/index.js';

function describeType(type: FieldType): string {
  switch (type.kind) {
    case 'primitive':
      return type.name;
    case 'datetime':
      return type.formats.length > 0 ? `date (${type.formats.join(', ')})` : 'date';
    case 'object':
      return `object with ${type.fields.length} field(s)`;
  }
}

async function main() {
  const index = process.argv[2] ?? 'orders';

  const client = new ElasticsearchClient({
    host: 'localhost',
    port: 9200,
    scrollSize: 500,
    scrollTimeoutMs: 30000,
    retry: {
      initialDelayMs: 10,
      maxDelayMs: 1000,
    },
  });

  try {
    console.log('Connecting to cluster...');
    await client.connect();
    console.log(`Connected! Data nodes: ${client.getHosts().join(', ')}`);

    // === Metadata ===

    console.log('\n=== Indexes ===');
    for (const name of await client.getIndexes()) {
      console.log(`  - ${name}`);
    }

    console.log(`\n=== Mapping of ${index} ===`);
    const metadata = await client.getIndexMetadata(index);
    for (const field of metadata.schema.fields) {
      console.log(`  ${field.name}: ${describeType(field.type)}`);
    }

    // === Shard routing ===

    console.log('\n=== Shards ===');
    const shards = await client.getSearchShards(index);
    for (const shard of shards) {
      console.log(`  shard ${shard.shardNumber} -> ${shard.nodeAddress}`);
    }

    // === Scroll every shard ===

    console.log('\n=== Scan ===');
    let total = 0;
    for (const shard of shards) {
      let count = 0;
      for await (const hits of client.scanShard({
        index,
        shardNumber: shard.shardNumber,
        query: { match_all: {} },
      })) {
        count += hits.length;
      }
      console.log(`  shard ${shard.shardNumber}: ${count} document(s)`);
      total += count;
    }
    console.log(`Total: ${total}`);

    // === Query failures ===

    console.log('\n=== Query failure ===');
    try {
      await client.beginSearch({
        index,
        shardNumber: 0,
        query: { range: { 'no such field': { gte: 'not a number' } } },
      });
    } catch (err) {
      if (err instanceof QueryFailureError) {
        console.log(`Rejected by the cluster: ${err.reason}`);
      } else {
        throw err;
      }
    }
  } catch (err) {
    console.error('Error:', err);
    process.exitCode = 1;
  } finally {
    // Always close the client
    console.log('\nClosing client...');
    await client.close();
    console.log('Client closed');
  }
}

// Run the example
main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});

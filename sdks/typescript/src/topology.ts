/**
 * Cluster topology discovery.
 *
 * Every call queries the cluster afresh; nothing is cached between calls.
 */

import { decodeDataNodes } from '@shardscroll/client/decoder';
import { expectBody, type ClusterTransport, type RequestOptions } from '@shardscroll/client/transport';
import type { ClusterNode } from '@shardscroll/client/types';

export const NODES_PATH = '/_nodes/http';

/**
 * Discovers the data-holding nodes of the cluster.
 */
export class TopologyDiscovery {
  constructor(private readonly transport: ClusterTransport) {}

  /**
   * Fetch the current data nodes, keyed by node ID, in the order the cluster
   * reported them. Coordinator-only and other non-data nodes are excluded.
   *
   * @throws ConnectionError if the cluster cannot be reached
   * @throws InvalidResponseError if the node listing cannot be decoded
   */
  async getNodes(options?: RequestOptions): Promise<Map<string, ClusterNode>> {
    const body = expectBody(await this.transport.get(NODES_PATH, options), `GET ${NODES_PATH}`);
    return decodeDataNodes(body);
  }
}

/**
 * Connection URL for every node, e.g. "https://10.0.0.4:9200".
 */
export function nodeUrls(nodes: Iterable<ClusterNode>, scheme: 'http' | 'https'): string[] {
  return Array.from(nodes, (node) => `${scheme}://${node.address}`);
}

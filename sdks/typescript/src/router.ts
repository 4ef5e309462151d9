/**
 * Shard routing for search requests.
 *
 * This module handles:
 * - Ordering the copies of a shard by read preference (replicas first)
 * - Picking a copy that lives on a known data node
 * - Fallback routing when no copy lives on a known data node
 */

import { decodeShardGroups } from '@shardscroll/client/decoder';
import { NoNodesAvailableError } from '@shardscroll/client/errors';
import { expectBody, type ClusterTransport } from '@shardscroll/client/transport';
import type { TopologyDiscovery } from '@shardscroll/client/topology';
import type {
  ClusterNode,
  Logger,
  ShardAssignment,
  ShardCandidate,
  ShardGroup,
} from '@shardscroll/client/types';

/**
 * Comparator that puts replicas ahead of primaries and leaves everything
 * else in place (Array.prototype.sort is stable).
 */
export function shardPreference(left: ShardCandidate, right: ShardCandidate): number {
  if (left.isPrimary === right.isPrimary) {
    return 0;
  }
  return left.isPrimary ? 1 : -1;
}

/**
 * Copies of a shard in preference order.
 */
export function orderByPreference(group: ShardGroup): ShardCandidate[] {
  return [...group].sort(shardPreference);
}

/**
 * Routing decision for one shard group, with whether it was a guess.
 */
export interface RoutingDecision {
  assignment: ShardAssignment;

  /** True when no copy lives on a known node and the node was picked arbitrarily */
  isGuess: boolean;
}

/**
 * Route one shard group against a topology snapshot.
 *
 * The most preferred copy on a known node wins. When no copy is on a known
 * node, the most preferred copy is sent to
 * `knownNodes[shardNumber % knownNodes.length]`; that node may not hold the
 * shard, and the cluster is left to handle it.
 *
 * @throws NoNodesAvailableError if a fallback is needed and no nodes are known
 */
export function routeShardGroup(
  group: ShardGroup,
  nodesById: ReadonlyMap<string, ClusterNode>
): RoutingDecision {
  const preferred = orderByPreference(group);

  for (const candidate of preferred) {
    const node = candidate.nodeId !== null ? nodesById.get(candidate.nodeId) : undefined;
    if (node) {
      return {
        assignment: { shardNumber: candidate.shardNumber, nodeAddress: node.address },
        isGuess: false,
      };
    }
  }

  const [chosen] = preferred;
  const nodes = [...nodesById.values()];
  if (chosen === undefined || nodes.length === 0) {
    throw new NoNodesAvailableError(
      `Cannot route shard ${chosen?.shardNumber ?? '<empty group>'}: no data nodes known`
    );
  }

  return {
    assignment: {
      shardNumber: chosen.shardNumber,
      nodeAddress: nodes[chosen.shardNumber % nodes.length].address,
    },
    isGuess: true,
  };
}

/**
 * Route every shard group against a topology snapshot, in group order.
 */
export function assignShards(
  groups: readonly ShardGroup[],
  nodesById: ReadonlyMap<string, ClusterNode>
): RoutingDecision[] {
  return groups.map((group) => routeShardGroup(group, nodesById));
}

/**
 * Resolves the shards of an index to the nodes that should serve them.
 */
export class ShardRouter {
  constructor(
    private readonly transport: ClusterTransport,
    private readonly topology: TopologyDiscovery,
    private readonly logger: Logger
  ) {}

  /**
   * One assignment per logical shard of `index`.
   *
   * Takes a fresh topology snapshot on every call, so assignments never
   * reference nodes from an older snapshot.
   *
   * @throws ConnectionError if the cluster cannot be reached
   * @throws InvalidResponseError if the shard placement cannot be decoded
   * @throws NoNodesAvailableError if a shard needs a fallback and no data nodes are known
   */
  async getSearchShards(index: string): Promise<ShardAssignment[]> {
    const nodesById = await this.topology.getNodes();

    const path = `/${encodeURIComponent(index)}/_search_shards`;
    const groups = decodeShardGroups(expectBody(await this.transport.get(path), `GET ${path}`));

    return assignShards(groups, nodesById).map(({ assignment, isGuess }) => {
      if (isGuess) {
        this.logger.warn(
          `No copy of shard ${assignment.shardNumber} of ${index} is on a known data node; routing to ${assignment.nodeAddress}`
        );
      }
      return assignment;
    });
  }
}

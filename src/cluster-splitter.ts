/**
 * Break oversized groups into denser sub-clusters
 *
 * A long transitive chain (A~B, B~C, C~D ...) can glue together images that
 * look nothing alike end to end. Groups above the cap are re-cut around
 * their best-connected members using "highest-degree seed growth":
 *
 * 1. keep only pairs with both ends inside the group
 * 2. rank members by internal degree, highest first; ties keep group order
 * 3. each unvisited member seeds a cluster and pulls in its unvisited direct
 *    neighbours (one hop, a star, not another transitive closure); the seed
 *    and everything it pulls in are marked visited
 * 4. clusters of one (a seed whose neighbours were all taken) are dropped,
 *    so members that share no pair are never offered together
 * 5. if nothing survives, the group is returned whole
 *
 * Every member is visited either as a seed or as a neighbour, so no
 * members are left over once the pass ends.
 *
 * This is a greedy heuristic, not a maximum-density partition.
 */

import { Logger } from './logger.js';
import type { Group, SimilarPair } from './types.js';

const logger = new Logger({ context: 'cluster-splitter' });

export const MAX_GROUP_SIZE = 20;

export function splitLargeGroup(group: Group, pairs: ReadonlyArray<SimilarPair>): Group[] {
  const position = new Map<string, number>();
  group.forEach((member, index) => position.set(member, index));

  const neighbours = new Map<string, Set<string>>();
  for (const member of group) {
    neighbours.set(member, new Set());
  }

  for (const [a, b] of pairs) {
    if (a === b) continue;
    const fromA = neighbours.get(a);
    const fromB = neighbours.get(b);
    if (!fromA || !fromB) continue;
    fromA.add(b);
    fromB.add(a);
  }

  const degree = (member: string): number => neighbours.get(member)?.size ?? 0;
  const byGroupOrder = (a: string, b: string): number =>
    (position.get(a) ?? 0) - (position.get(b) ?? 0);

  // Array.prototype.sort is stable, so equal degrees keep group order
  const seeds = [...group].sort((a, b) => degree(b) - degree(a));

  const visited = new Set<string>();
  const clusters: Group[] = [];

  for (const seed of seeds) {
    if (visited.has(seed)) continue;

    visited.add(seed);
    const direct = [...(neighbours.get(seed) ?? [])]
      .filter(member => !visited.has(member))
      .sort(byGroupOrder);

    for (const member of direct) {
      visited.add(member);
    }

    if (direct.length > 0) {
      clusters.push([seed, ...direct]);
    }
  }

  if (clusters.length === 0) {
    logger.warn('Oversized group has no internal pairs, keeping it whole', { size: group.length });
    return [group];
  }

  return clusters;
}

/**
 * Pass small groups through and split the ones above `maxGroupSize`,
 * keeping the overall group order
 */
export function splitOversizedGroups(
  groups: ReadonlyArray<Group>,
  pairs: ReadonlyArray<SimilarPair>,
  maxGroupSize: number = MAX_GROUP_SIZE
): Group[] {
  const result: Group[] = [];

  for (const group of groups) {
    if (group.length <= maxGroupSize) {
      result.push(group);
      continue;
    }

    const parts = splitLargeGroup(group, pairs);
    logger.debug(`Split group of ${group.length} into ${parts.length} clusters`, {
      sizes: parts.map(part => part.length),
    });
    result.push(...parts);
  }

  return result;
}

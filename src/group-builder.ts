/**
 * Merge similar pairs into connected groups
 */

import type { Group, SimilarPair } from './types.js';

/**
 * Disjoint sets over dense indices. The smaller set is always attached
 * under the larger one; `find` halves paths as it walks.
 */
export class UnionFind {
  private parent: number[] = [];
  private size: number[] = [];

  add(): number {
    const index = this.parent.length;
    this.parent.push(index);
    this.size.push(1);
    return index;
  }

  get length(): number {
    return this.parent.length;
  }

  find(index: number): number {
    let current = index;
    while (this.parent[current] !== current) {
      this.parent[current] = this.parent[this.parent[current]];
      current = this.parent[current];
    }
    return current;
  }

  union(a: number, b: number): number {
    let rootA = this.find(a);
    let rootB = this.find(b);
    if (rootA === rootB) return rootA;

    if (this.size[rootA] < this.size[rootB]) {
      [rootA, rootB] = [rootB, rootA];
    }
    this.parent[rootB] = rootA;
    this.size[rootA] += this.size[rootB];
    return rootA;
  }

  setSize(index: number): number {
    return this.size[this.find(index)];
  }
}

/**
 * Connected components of the similarity graph.
 *
 * Members are listed in order of first appearance in `pairs`, groups in the
 * order of their first-seen member, so the output does not depend on how
 * the unions happened to be resolved.
 */
export function buildGroups(pairs: ReadonlyArray<SimilarPair>): Group[] {
  if (pairs.length === 0) {
    return [];
  }

  const sets = new UnionFind();
  const indexOf = new Map<string, number>();
  const ids: string[] = [];

  const intern = (id: string): number => {
    const existing = indexOf.get(id);
    if (existing !== undefined) return existing;
    const index = sets.add();
    indexOf.set(id, index);
    ids.push(id);
    return index;
  };

  for (const [a, b] of pairs) {
    const indexA = intern(a);
    const indexB = intern(b);
    if (indexA !== indexB) {
      sets.union(indexA, indexB);
    }
  }

  const byRoot = new Map<number, Group>();
  for (let index = 0; index < ids.length; index++) {
    const root = sets.find(index);
    const group = byRoot.get(root);
    if (group) {
      group.push(ids[index]);
    } else {
      byRoot.set(root, [ids[index]]);
    }
  }

  return [...byRoot.values()].filter(group => group.length > 1);
}

import { describe, it, expect } from 'vitest';
import { MAX_GROUP_SIZE, splitLargeGroup, splitOversizedGroups } from './cluster-splitter.js';
import type { Group, SimilarPair } from './types.js';

function range(prefix: string, count: number): string[] {
  return Array.from({ length: count }, (_, index) => `${prefix}${index + 1}`);
}

function star(hub: string, spokes: string[]): SimilarPair[] {
  return spokes.map(spoke => [hub, spoke] as const);
}

describe('splitOversizedGroups', () => {
  it('should use a cap of 20', () => {
    expect(MAX_GROUP_SIZE).toBe(20);
  });

  it('should pass groups at or below the cap through unchanged', () => {
    const group = range('m', 20);
    const pairs: SimilarPair[] = group.slice(1).map((member, index) => [group[index], member] as const);
    const small: Group = ['x', 'y'];

    const result = splitOversizedGroups([group, small], pairs);

    expect(result).toEqual([group, small]);
    expect(result[0]).toBe(group);
  });

  it('should respect a custom cap', () => {
    const pairs: SimilarPair[] = [['a', 'b'], ['b', 'c'], ['c', 'd']];

    expect(splitOversizedGroups([['a', 'b', 'c', 'd']], pairs, 3)).toEqual([['b', 'a', 'c']]);
  });

  it('should keep group order around split groups', () => {
    const large = ['h', ...range('s', 20)];
    const pairs = star('h', range('s', 20));

    const result = splitOversizedGroups([['p', 'q'], large, ['r', 't']], [...pairs, ['p', 'q'], ['r', 't']]);

    expect(result).toEqual([['p', 'q'], large, ['r', 't']]);
  });
});

describe('splitLargeGroup', () => {
  it('should cut two stars joined through a bridge into two clusters', () => {
    const spokesA = range('a', 10);
    const spokesB = range('b', 9);
    const group = ['H1', ...spokesA, 'X', 'H2', ...spokesB];
    const pairs: SimilarPair[] = [
      ...star('H1', spokesA),
      ...star('H2', spokesB),
      ['H1', 'X'],
      ['X', 'H2'],
    ];

    expect(splitLargeGroup(group, pairs)).toEqual([
      ['H1', ...spokesA, 'X'],
      ['H2', ...spokesB],
    ]);
  });

  it('should drop members whose neighbours were all taken by earlier clusters', () => {
    const spokesA = range('a', 10);
    const spokesB = range('b', 9);
    const group = ['H1', ...spokesA, 'H2', ...spokesB, 'c'];
    const pairs: SimilarPair[] = [
      ...star('H1', spokesA),
      ...star('H2', spokesB),
      ['H1', 'H2'],
      ['a1', 'c'],
    ];

    expect(splitLargeGroup(group, pairs)).toEqual([['H1', ...spokesA, 'H2']]);
  });

  it('should not group members that share no pair', () => {
    const leaves = range('L', 20);
    const group = ['H', ...leaves, 'X', 'Y'];
    const pairs: SimilarPair[] = [...star('H', leaves), ['L1', 'X'], ['L2', 'Y']];

    const clusters = splitLargeGroup(group, pairs);

    expect(clusters).toEqual([['H', ...leaves]]);
    expect(clusters.flat()).not.toContain('X');
    expect(clusters.flat()).not.toContain('Y');
  });

  it('should place every member in at most one cluster, seeds included', () => {
    const leaves = range('L', 20);
    const group = ['H', ...leaves, 'X'];
    const pairs: SimilarPair[] = [...star('H', leaves), ['L1', 'X'], ['X', 'L2']];

    const clusters = splitLargeGroup(group, pairs);
    const members = clusters.flat();

    expect(new Set(members).size).toBe(members.length);
    expect(clusters).toEqual([['H', ...leaves]]);
  });

  it('should break degree ties by position in the group', () => {
    const chain = Array.from({ length: 21 }, (_, index) => `m${index}`);
    const pairs: SimilarPair[] = chain.slice(1).map((member, index) => [chain[index], member] as const);

    const expected: Group[] = [['m1', 'm0', 'm2']];
    for (let index = 3; index < 21; index += 2) {
      expected.push([`m${index}`, `m${index + 1}`]);
    }

    expect(splitLargeGroup(chain, pairs)).toEqual(expected);
  });

  it('should return the group whole when it has no internal pairs', () => {
    const group = range('n', 21);
    const outside: SimilarPair[] = [['elsewhere', 'n1'], ['other', 'another']];

    expect(splitLargeGroup(group, [])).toEqual([group]);
    expect(splitLargeGroup(group, outside)).toEqual([group]);
  });

  it('should never invent or repeat members', () => {
    const group = range('k', 25);
    const pairs: SimilarPair[] = [];
    for (let i = 0; i < group.length; i++) {
      for (let j = i + 1; j < group.length; j++) {
        if ((i * j) % 4 === 1) {
          pairs.push([group[i], group[j]]);
        }
      }
    }

    const clusters = splitLargeGroup(group, pairs);
    const members = clusters.flat();

    expect(clusters.length).toBeGreaterThanOrEqual(1);
    expect(new Set(members).size).toBe(members.length);
    for (const member of members) {
      expect(group).toContain(member);
    }
    for (const cluster of clusters) {
      expect(cluster.length).toBeGreaterThanOrEqual(2);
    }
  });
});

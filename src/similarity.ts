/**
 * Pairwise fingerprint comparison
 */

import { AppError } from './logger.js';
import type { Fingerprint, Item, SimilarPair } from './types.js';

export function assertThreshold(threshold: number): void {
  if (!Number.isFinite(threshold) || threshold < 0) {
    throw new AppError(
      `Similarity threshold must be a non-negative number, got ${threshold}`,
      'INVALID_THRESHOLD',
      400,
      { threshold }
    );
  }
}

/**
 * Two fingerprints are similar when their distance does not exceed the threshold
 * (the lower the threshold, the stricter the match)
 */
export function areSimilar<F extends Fingerprint<F>>(a: F, b: F, threshold: number): boolean {
  return a.distance(b) <= threshold;
}

/**
 * Compare every item with every other one and report each unordered
 * similar pair exactly once. Quadratic in the number of items.
 */
export function findSimilarPairs<F extends Fingerprint<F>>(
  items: ReadonlyArray<Item<F>>,
  threshold: number
): SimilarPair[] {
  assertThreshold(threshold);

  const seen = new Set<string>();
  for (const item of items) {
    if (seen.has(item.path)) {
      throw new AppError(`Duplicate item: ${item.path}`, 'DUPLICATE_ITEM', 400, { path: item.path });
    }
    seen.add(item.path);
  }

  const pairs: SimilarPair[] = [];

  for (let i = 0; i < items.length; i++) {
    for (let j = i + 1; j < items.length; j++) {
      if (areSimilar(items[i].fingerprint, items[j].fingerprint, threshold)) {
        pairs.push([items[i].path, items[j].path]);
      }
    }
  }

  return pairs;
}

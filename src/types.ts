/**
 * Core types shared by the clustering engine and the file-lifecycle tracker
 */

/**
 * Anything that can tell how far it is from another value of its own kind.
 * The engine only ever calls `distance`, so perceptual hashes, embedding
 * vectors or test doubles all plug in the same way.
 */
export interface Fingerprint<Self = unknown> {
  /** Symmetric, non-negative; 0 means identical */
  distance(other: Self): number;
}

export interface Item<F extends Fingerprint<F>> {
  /** Absolute path, unique within one run */
  path: string;
  fingerprint: F;
}

/** Unordered pair of distinct item paths within the similarity threshold */
export type SimilarPair = readonly [string, string];

/** Item paths believed to show the same subject (always two or more) */
export type Group = string[];

/** original path -> destination path, in materialization order */
export type Mapping = Map<string, string>;

export interface ItemFailure {
  path: string;
  reason: string;
  code?: string;
}

export interface MaterializeResult {
  mapping: Mapping;
  groupDirs: string[];
  copied: number;
  missing: string[];
  failures: ItemFailure[];
  mappingPath?: string;
}

export type ReconcileStatus = 'written' | 'none' | 'no-mapping' | 'no-output';

export interface ReconcileResult {
  status: ReconcileStatus;
  deletions: string[];
  mappingSize: number;
  remainingFiles: number;
  deletionListPath?: string;
}

export interface CleanupSummary {
  listFound: boolean;
  deleted: number;
  skipped: number;
  failed: number;
  deletedPaths: string[];
  skippedPaths: string[];
  failures: ItemFailure[];
}

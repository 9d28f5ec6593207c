/**
 * photo-dedupe — near-duplicate image grouping and cleanup
 */

export * from './types.js';
export { areSimilar, findSimilarPairs } from './similarity.js';
export { buildGroups, UnionFind } from './group-builder.js';
export { MAX_GROUP_SIZE, splitLargeGroup, splitOversizedGroups } from './cluster-splitter.js';
export { pathToFilename, reserveFilename, withCollisionSuffix } from './safe-filename.js';
export { createOutputFolders, type MaterializeOptions, type NamingStrategy } from './materializer.js';
export { MappingStore } from './mapping-store.js';
export {
  DeletionReconciler,
  findDeletions,
  listOutputFiles,
  readDeletionList,
  writeDeletionList,
} from './deletion-reconciler.js';
export { Cleaner } from './cleaner.js';
export { BitFingerprint } from './fingerprint.js';
export { computePerceptualHash, fingerprintImages, lowFrequencyDct, DEFAULT_HASH_SIZE } from './perceptual-hash.js';
export { findImageFiles, IMAGE_EXTENSIONS } from './image-finder.js';
export { ConfigManager, DEFAULT_CONFIG, type DedupeConfig } from './config.js';
export { AppError, Logger, logger, handleError } from './logger.js';
export {
  cluster,
  materialize,
  reconcileAndClean,
  findDuplicates,
  checkDeleted,
  cleanupDeleted,
  type FindResult,
  type ReconcileAndCleanSummary,
} from './pipeline.js';
